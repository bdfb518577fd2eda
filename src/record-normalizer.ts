import * as cheerio from "cheerio";
import { formatClockTime, parseDateValue, parseTimeValue } from "./date-utils.js";
import { logger } from "./logger.js";
import {
  isRecord,
  locateArray,
  pickArray,
  pickBoolean,
  pickNumber,
  pickRecord,
  pickString,
  pickValue,
  recordsOf,
  resolveTimeSpan,
  soleArray,
  stringsOf,
  toNumber,
  type UnknownRecord,
} from "./record-utils.js";
import {
  ElementType,
  elementTypeFrom,
  type ElementSummary,
  type Exam,
  type Holiday,
  type HomeWork,
  type MasterData,
  type MessageAttachment,
  type MessageOfDay,
  type SchoolSearchResult,
  type SchoolYear,
  type StudentAbsence,
  type TimeGridDay,
  type TimeGridUnit,
  type UserData,
} from "./types.js";

/** Plain text of an HTML fragment; `<br>` becomes a line break. */
export function stripHtml(html: string): string {
  if (!/[<&]/.test(html)) {
    return html.trim();
  }
  const $ = cheerio.load(html, null, false);
  $("br").replaceWith("\n");
  return $.root().text().trim();
}

/** Locates a list and maps each record, dropping the ones `map` rejects. */
function collect<T>(
  payload: unknown,
  paths: readonly string[],
  map: (record: UnknownRecord, index: number) => T | null,
  label: string,
): T[] {
  const items = locateArray(payload, paths) ?? soleArray(payload) ?? [];
  const results: T[] = [];

  items.forEach((item, index) => {
    if (!isRecord(item)) {
      logger.debug(`[NORMALIZE] Dropped non-object ${label} at ${index}`);
      return;
    }
    try {
      const mapped = map(item, index);
      if (mapped) {
        results.push(mapped);
      } else {
        logger.debug(`[NORMALIZE] Dropped unusable ${label} at ${index}`);
      }
    } catch (error) {
      logger.debug(
        `[NORMALIZE] Dropped ${label} at ${index}:`,
        error instanceof Error ? error.message : "Unknown error",
      );
    }
  });

  return results;
}

/** Names from a list that may hold strings, ids or element records. */
function namesOf(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return typeof value === "string" && value.trim() !== "" ? [value] : [];
  }
  const names: string[] = [];
  for (const item of value) {
    if (typeof item === "string" && item.trim() !== "") {
      names.push(item);
    } else if (typeof item === "number") {
      names.push(String(item));
    } else if (isRecord(item)) {
      const name = pickString(item, ["name", "displayName", "shortName", "longName", "longname"]);
      if (name) {
        names.push(name);
      }
    }
  }
  return names;
}

export function toElementSummary(
  record: UnknownRecord,
  type: ElementType,
): ElementSummary | null {
  const id = pickNumber(record, ["id"]);
  if (id === undefined) {
    return null;
  }

  const first = pickString(record, ["firstName", "foreName", "forename"]);
  const last = pickString(record, ["lastName", "surname"]);
  const fullName = first && last ? `${first} ${last}` : undefined;

  const name =
    pickString(record, ["name", "shortName", "displayName"]) ?? last ?? String(id);
  return {
    type,
    id,
    name,
    longName:
      pickString(record, ["longName", "longname", "displayName"]) ?? fullName ?? name,
    alternateName: pickString(record, ["alternateName", "alternatename"]),
    foreColor: pickString(record, ["foreColor"]),
    backColor: pickString(record, ["backColor"]),
    active: pickBoolean(record, ["active"]) ?? true,
  };
}

const ELEMENT_LIST_PATHS = [
  "elements",
  "rooms",
  "klassen",
  "classes",
  "teachers",
  "subjects",
  "result",
];

export function normalizeElementList(
  payload: unknown,
  type: ElementType,
): ElementSummary[] {
  return collect(
    payload,
    ELEMENT_LIST_PATHS,
    (record) => toElementSummary(record, type),
    `${type.toLowerCase()} element`,
  );
}

const DAY_NAMES = ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT"];

function dayNumber(value: unknown): number | undefined {
  const numeric = toNumber(value);
  if (numeric !== undefined) {
    return numeric;
  }
  if (typeof value === "string") {
    const index = DAY_NAMES.indexOf(value.trim().slice(0, 3).toUpperCase());
    return index === -1 ? undefined : index + 1;
  }
  return undefined;
}

function clockOf(value: unknown): string | undefined {
  // The mobile API writes times of day as "T08:00".
  const raw = typeof value === "string" ? value.replace(/^T/, "") : value;
  const time = parseTimeValue(raw);
  return time ? formatClockTime(time) : undefined;
}

function normalizeTimeGrid(value: unknown): TimeGridDay[] {
  return collect(
    value,
    ["days"],
    (record) => {
      const day = dayNumber(pickValue(record, ["day"]));
      if (day === undefined) {
        return null;
      }
      const units: TimeGridUnit[] = [];
      recordsOf(pickArray(record, ["units", "timeUnits"])).forEach((unit, index) => {
        const startTime = clockOf(unit.startTime);
        const endTime = clockOf(unit.endTime);
        if (startTime && endTime) {
          units.push({
            label: pickString(unit, ["label", "name"]) ?? String(index + 1),
            startTime,
            endTime,
          });
        }
      });
      return { day, units };
    },
    "time grid day",
  );
}

function toSchoolYear(record: UnknownRecord): SchoolYear | null {
  const startDate = parseDateValue(pickValue(record, ["startDate", "start"]));
  const endDate = parseDateValue(pickValue(record, ["endDate", "end"]));
  if (!startDate || !endDate) {
    return null;
  }
  return {
    id: pickNumber(record, ["id"]) ?? 0,
    name: pickString(record, ["name", "displayName"]) ?? "",
    startDate,
    endDate,
  };
}

export function normalizeSchoolYears(payload: unknown): SchoolYear[] {
  return collect(payload, ["schoolyears", "schoolYears"], toSchoolYear, "school year");
}

/** A single school year, from either one record or the first of a list. */
export function normalizeSchoolYear(payload: unknown): SchoolYear | null {
  if (isRecord(payload)) {
    const direct = toSchoolYear(payload);
    if (direct) {
      return direct;
    }
  }
  return normalizeSchoolYears(payload)[0] ?? null;
}

export function normalizeHolidays(payload: unknown): Holiday[] {
  return collect(
    payload,
    ["holidays"],
    (record, index) => {
      const startDate = parseDateValue(pickValue(record, ["startDate", "start"]));
      const endDate = parseDateValue(pickValue(record, ["endDate", "end"]));
      if (!startDate || !endDate) {
        return null;
      }
      const name = pickString(record, ["name", "shortName"]) ?? "";
      return {
        id: pickNumber(record, ["id"]) ?? index,
        name,
        longName: pickString(record, ["longName", "longname"]) ?? name,
        startDate,
        endDate,
      };
    },
    "holiday",
  );
}

export function emptyMasterData(): MasterData {
  return {
    timeStamp: 0,
    klassen: [],
    rooms: [],
    subjects: [],
    teachers: [],
    timeGrid: [],
    schoolYears: [],
    holidays: [],
  };
}

export function normalizeMasterData(payload: unknown): MasterData {
  if (!isRecord(payload)) {
    return emptyMasterData();
  }

  const list = (keys: string[], type: ElementType): ElementSummary[] =>
    normalizeElementList(pickArray(payload, keys) ?? [], type);

  return {
    timeStamp: pickNumber(payload, ["timeStamp", "timestamp"]) ?? 0,
    klassen: list(["klassen", "classes"], ElementType.CLASS),
    rooms: list(["rooms"], ElementType.ROOM),
    subjects: list(["subjects"], ElementType.SUBJECT),
    teachers: list(["teachers"], ElementType.TEACHER),
    timeGrid: normalizeTimeGrid(pickValue(payload, ["timeGrid", "timegrid"]) ?? []),
    schoolYears: normalizeSchoolYears(pickArray(payload, ["schoolyears", "schoolYears"]) ?? []),
    holidays: normalizeHolidays(pickArray(payload, ["holidays"]) ?? []),
  };
}

export function normalizeUserData(payload: unknown): UserData {
  const root = isRecord(payload) ? payload : {};
  const inner = pickRecord(root, ["userData", "user"]) ?? root;
  const person = pickRecord(inner, ["person"]);
  const tenant = pickRecord(root, ["tenant", "school"]);

  const masterData = pickRecord(root, ["masterData"]);

  return {
    masterId: pickNumber(inner, ["masterId"]) ?? null,
    personType: elementTypeFrom(
      pickValue(inner, ["elemType", "personType", "roleType"]) ??
        (person ? pickValue(person, ["type"]) : undefined),
    ),
    personId:
      pickNumber(inner, ["elemId", "personId"]) ??
      (person ? pickNumber(person, ["id"]) : undefined) ??
      null,
    displayName:
      pickString(inner, ["displayName", "name"]) ??
      (person ? pickString(person, ["displayName", "name"]) : undefined) ??
      "",
    schoolName:
      pickString(inner, ["schoolName"]) ??
      (tenant ? pickString(tenant, ["displayName", "name"]) : undefined) ??
      "",
    departmentId: pickNumber(inner, ["departmentId"]) ?? 0,
    klasseId: pickNumber(inner, ["klasseId", "classId"]) ?? null,
    rights: stringsOf(pickArray(inner, ["rights", "permissions"])),
    masterData: masterData ? normalizeMasterData(masterData) : null,
  };
}

export function normalizeMessages(payload: unknown): MessageOfDay[] {
  return collect(
    payload,
    ["messages", "messagesOfDay", "messageOfDayCollection", "news"],
    (record, index) => {
      const subject = pickString(record, ["subject", "title"]) ?? "";
      const text = stripHtml(pickString(record, ["text", "body", "content"]) ?? "");
      if (subject === "" && text === "") {
        return null;
      }

      const attachments: MessageAttachment[] = [];
      recordsOf(pickArray(record, ["attachments"])).forEach((attachment, position) => {
        const url = pickString(attachment, ["url", "href"]);
        if (url) {
          attachments.push({
            id: pickNumber(attachment, ["id"]) ?? position,
            name: pickString(attachment, ["name", "fileName"]) ?? url,
            url,
          });
        }
      });

      return {
        id: pickNumber(record, ["id"]) ?? index,
        subject,
        text,
        isExpired: pickBoolean(record, ["isExpired", "expired"]) ?? false,
        isImportant: pickBoolean(record, ["isImportant", "important"]) ?? false,
        attachments,
      };
    },
    "message",
  );
}

export function normalizeExams(payload: unknown): Exam[] {
  return collect(
    payload,
    ["exams", "tests", "examinations"],
    (record, index) => {
      const span = resolveTimeSpan(record, {
        date: ["date", "examDate", "startDate"],
        start: ["startDateTime", "startTime"],
        end: ["endDateTime", "endTime"],
      });
      if (span.source === "defaulted") {
        return null;
      }
      const subject = pickString(record, ["subject", "subjectName"]);
      return {
        id: pickNumber(record, ["id", "examId"]) ?? index,
        examType: pickString(record, ["examType", "type"]),
        name: pickString(record, ["name", "title"]) ?? subject ?? "Exam",
        text: pickString(record, ["text", "description"]),
        subject,
        startDateTime: span.start,
        endDateTime: span.end,
        classes: namesOf(pickValue(record, ["classes", "studentClass", "klassen"])),
        teachers: namesOf(pickValue(record, ["teachers"])),
        rooms: namesOf(pickValue(record, ["rooms"])),
      };
    },
    "exam",
  );
}

export function normalizeHomework(payload: unknown): HomeWork[] {
  const subjects = new Map<number, string>();
  if (isRecord(payload)) {
    for (const lesson of recordsOf(payload.lessons)) {
      const id = pickNumber(lesson, ["id"]);
      const subject = pickString(lesson, ["subject", "name"]);
      if (id !== undefined && subject) {
        subjects.set(id, subject);
      }
    }
  }

  return collect(
    payload,
    ["homeWorks", "homeworks", "homework", "assignments"],
    (record, index) => {
      const date = parseDateValue(pickValue(record, ["startDate", "date", "assignedDate"]));
      if (!date) {
        return null;
      }
      const lessonId = pickNumber(record, ["lessonId"]) ?? 0;
      return {
        id: pickNumber(record, ["id"]) ?? index,
        lessonId,
        subject: pickString(record, ["subject"]) ?? subjects.get(lessonId),
        text: stripHtml(pickString(record, ["text", "description"]) ?? ""),
        remark: pickString(record, ["remark"]),
        date,
        dueDate: parseDateValue(pickValue(record, ["endDate", "dueDate", "deadline"])) ?? date,
        completed: pickBoolean(record, ["completed", "done"]) ?? false,
      };
    },
    "homework",
  );
}

export function normalizeAbsences(payload: unknown): StudentAbsence[] {
  return collect(
    payload,
    ["absences", "studentAbsences"],
    (record, index) => {
      // The student service nests the span as `duration: { start, end }`.
      const span = resolveTimeSpan(pickRecord(record, ["duration"]) ?? record, {
        date: ["date", "startDate"],
        start: ["startDateTime", "startTime", "from", "start"],
        end: ["endDateTime", "endTime", "to", "end"],
      });
      if (span.source === "defaulted") {
        return null;
      }
      const klasse = pickRecord(record, ["klasse"]);
      const excuseStatus = pickRecord(record, ["excuseStatus"]);
      const excuseType = excuseStatus ? pickString(excuseStatus, ["type"]) : undefined;
      return {
        id: pickNumber(record, ["id", "absenceId"]) ?? index,
        startDateTime: span.start,
        endDateTime: span.end,
        reason:
          pickString(record, ["reason", "absenceReason"]) ??
          (excuseStatus ? pickString(excuseStatus, ["name"]) : undefined),
        text: pickString(record, ["text", "note", "excuseText"]),
        className:
          (klasse ? pickString(klasse, ["displayName", "name"]) : undefined) ??
          pickString(record, ["class", "className"]),
        isExcused:
          pickBoolean(record, ["isExcused", "excused"]) ??
          (excuseType === undefined ? undefined : excuseType === "EXCUSED"),
      };
    },
    "absence",
  );
}

export function normalizeSchoolSearch(payload: unknown): SchoolSearchResult[] {
  return collect(
    payload,
    ["schools"],
    (record) => {
      const loginName = pickString(record, ["loginName", "loginSchool"]);
      const displayName = pickString(record, ["displayName", "name"]);
      if (!loginName && !displayName) {
        return null;
      }
      const server = pickString(record, ["server"]) ?? "";
      return {
        schoolId: pickNumber(record, ["schoolId", "id"]) ?? 0,
        loginName: loginName ?? displayName ?? "",
        displayName: displayName ?? loginName ?? "",
        server,
        serverUrl: pickString(record, ["serverUrl", "mobileServiceUrl"]) ?? (server ? `https://${server}` : ""),
        address: pickString(record, ["address"]),
      };
    },
    "school",
  );
}
