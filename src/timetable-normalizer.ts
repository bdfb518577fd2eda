import { z } from "zod";
import { parseCalendarDay, parseDateValue, startOfDay } from "./date-utils.js";
import { logger } from "./logger.js";
import { normalizeMasterData } from "./record-normalizer.js";
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
  DEFAULT_BACK_COLOR,
  DEFAULT_FORE_COLOR,
  ElementType,
  PeriodRight,
  PeriodState,
  elementTypeFrom,
  type DateRange,
  type MasterData,
  type Period,
  type PeriodElement,
  type PeriodExam,
  type PeriodHomeWork,
  type PeriodText,
  type Timetable,
} from "./types.js";

export type DecodeTier = "strict" | "structural" | "best-effort";

export type DecodeResult<T> =
  | { ok: true; value: T; tier: DecodeTier }
  | { ok: false; reason: string };

function ok<T>(value: T, tier: DecodeTier): DecodeResult<T> {
  return { ok: true, value, tier };
}

function fail<T>(reason: string): DecodeResult<T> {
  return { ok: false, reason };
}

function enumSet<T extends string>(values: unknown, allowed: readonly T[]): Set<T> {
  const result = new Set<T>();
  for (const value of stringsOf(values)) {
    const match = allowed.find((candidate) => candidate === value.toUpperCase());
    if (match) {
      result.add(match);
    }
  }
  return result;
}

const PERIOD_RIGHTS = Object.values(PeriodRight);
const PERIOD_STATES = Object.values(PeriodState);

// Tier 1: the mobile API period, which already is the canonical shape.

const strictElementSchema = z.object({
  type: z.string(),
  id: z.number().int(),
  name: z.string().optional(),
  longName: z.string().optional(),
  displayName: z.string().optional(),
  alternateName: z.string().optional(),
  foreColor: z.string().optional(),
  backColor: z.string().optional(),
  orgId: z.number().int().optional(),
  missing: z.boolean().optional(),
  state: z.string().optional(),
});

const strictPeriodSchema = z.object({
  id: z.number().int(),
  lessonId: z.number().int(),
  startDateTime: z.string(),
  endDateTime: z.string(),
  foreColor: z.string(),
  backColor: z.string(),
  innerForeColor: z.string(),
  innerBackColor: z.string(),
  text: z.object({
    lesson: z.string().nullish(),
    substitution: z.string().nullish(),
    info: z.string().nullish(),
  }),
  elements: z.array(strictElementSchema),
  can: z.array(z.string()),
  is: z.array(z.string()),
  homeWorks: z.array(z.unknown()).nullish(),
  exam: z.unknown().nullish(),
  isOnlinePeriod: z.boolean().optional(),
  onlinePeriodLink: z.string().nullish(),
  blockHash: z.number().nullish(),
});

const strictTimetableSchema = z.object({
  timetable: z.object({
    displayableStartDate: z.string(),
    displayableEndDate: z.string(),
    periods: z.array(z.unknown()),
  }),
  masterData: z.unknown().optional(),
});

function optionalText(value: string | null | undefined): string | undefined {
  return value === null || value === undefined || value.trim() === "" ? undefined : value;
}

function periodExam(value: unknown): PeriodExam | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const id = pickNumber(value, ["id"]);
  if (id === undefined) {
    return undefined;
  }
  return {
    id,
    examType: pickString(value, ["examtype", "examType"]),
    name: pickString(value, ["name"]),
    text: pickString(value, ["text"]),
  };
}

function periodHomeWorks(value: unknown): PeriodHomeWork[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return recordsOf(value).flatMap((record) => {
    const id = pickNumber(record, ["id"]);
    if (id === undefined) {
      return [];
    }
    return [
      {
        id,
        lessonId: pickNumber(record, ["lessonId"]) ?? 0,
        startDate: parseDateValue(pickValue(record, ["startDate"])) ?? undefined,
        endDate: parseDateValue(pickValue(record, ["endDate"])) ?? undefined,
        text: pickString(record, ["text"]) ?? "",
        remark: pickString(record, ["remark"]),
        completed: pickBoolean(record, ["completed"]) ?? false,
      },
    ];
  });
}

export function decodeStrictPeriod(record: unknown): DecodeResult<Period> {
  const parsed = strictPeriodSchema.safeParse(record);
  if (!parsed.success) {
    return fail(parsed.error.issues[0]?.message ?? "not a canonical period");
  }
  const data = parsed.data;

  const start = parseDateValue(data.startDateTime);
  const end = parseDateValue(data.endDateTime);
  if (!start || !end || end.getTime() < start.getTime()) {
    return fail("unreadable start/end");
  }

  const elements: PeriodElement[] = [];
  for (const element of data.elements) {
    const type = elementTypeFrom(element.type);
    if (!type) {
      return fail(`unknown element type ${element.type}`);
    }
    elements.push({
      type,
      id: element.id,
      name: element.name ?? "",
      longName: element.longName ?? element.name ?? "",
      displayName: element.displayName,
      alternateName: element.alternateName,
      foreColor: element.foreColor,
      backColor: element.backColor,
      orgId: element.orgId,
      missing: element.missing,
      state: element.state,
    });
  }

  return ok(
    {
      id: data.id,
      lessonId: data.lessonId,
      startDateTime: start,
      endDateTime: end,
      foreColor: data.foreColor,
      backColor: data.backColor,
      innerForeColor: data.innerForeColor,
      innerBackColor: data.innerBackColor,
      text: {
        lesson: optionalText(data.text.lesson),
        substitution: optionalText(data.text.substitution),
        info: optionalText(data.text.info),
      },
      elements,
      can: enumSet(data.can, PERIOD_RIGHTS),
      is: enumSet(data.is, PERIOD_STATES),
      homeWorks: periodHomeWorks(data.homeWorks),
      exam: periodExam(data.exam),
      isOnlinePeriod: data.isOnlinePeriod,
      onlinePeriodLink: optionalText(data.onlinePeriodLink),
      blockHash: data.blockHash ?? undefined,
    },
    "strict",
  );
}

// Tier 2: the public API / REST v3 period with kl/te/su/ro references.

const legacyRefSchema = z.object({
  id: z.number().int(),
  name: z.string().optional(),
  longname: z.string().optional(),
  longName: z.string().optional(),
  orgid: z.number().int().optional(),
  orgname: z.string().optional(),
});

const legacyPeriodSchema = z.object({
  id: z.number().int(),
  date: z.union([z.number(), z.string()]),
  startTime: z.union([z.number(), z.string()]),
  endTime: z.union([z.number(), z.string()]),
  lessonId: z.number().int().optional(),
  lsnumber: z.number().int().optional(),
  kl: z.array(legacyRefSchema).optional(),
  te: z.array(legacyRefSchema).optional(),
  su: z.array(legacyRefSchema).optional(),
  ro: z.array(legacyRefSchema).optional(),
  code: z.string().optional(),
  lstype: z.string().optional(),
  lstext: z.string().optional(),
  substText: z.string().optional(),
  info: z.string().optional(),
  bkText: z.string().optional(),
  bkRemark: z.string().optional(),
});

type LegacyRef = z.infer<typeof legacyRefSchema>;

const LEGACY_REF_KEYS: ReadonlyArray<readonly ["kl" | "te" | "su" | "ro", ElementType]> = [
  ["kl", ElementType.CLASS],
  ["te", ElementType.TEACHER],
  ["su", ElementType.SUBJECT],
  ["ro", ElementType.ROOM],
];

const SUBSTITUTION_STATE: Partial<Record<ElementType, PeriodState>> = {
  [ElementType.TEACHER]: PeriodState.TEACHERSUBSTITUTION,
  [ElementType.ROOM]: PeriodState.ROOMSUBSTITUTION,
  [ElementType.SUBJECT]: PeriodState.SUBJECTSUBSTITUTION,
};

function legacyElement(ref: LegacyRef, type: ElementType): PeriodElement {
  const name = ref.name ?? "";
  return {
    type,
    id: ref.id,
    name,
    longName: ref.longname ?? ref.longName ?? name,
    orgId: ref.orgid,
    orgName: ref.orgname,
  };
}

function statesFromCode(code: string | undefined, lessonType: string | undefined): Set<PeriodState> {
  const states = new Set<PeriodState>();
  switch (code?.toLowerCase()) {
    case "cancelled":
      states.add(PeriodState.CANCELLED);
      break;
    case "irregular":
      states.add(PeriodState.IRREGULAR);
      break;
  }
  if (lessonType?.toLowerCase() === "ex") {
    states.add(PeriodState.EXAM);
  }
  return states;
}

export function decodeLegacyPeriod(record: unknown): DecodeResult<Period> {
  const parsed = legacyPeriodSchema.safeParse(record);
  if (!parsed.success || !isRecord(record)) {
    return fail("not a public API period");
  }
  const data = parsed.data;

  const span = resolveTimeSpan(record, {
    date: ["date"],
    start: ["startTime"],
    end: ["endTime"],
  });
  if (span.source !== "explicit") {
    return fail("unreadable date/startTime");
  }

  const elements: PeriodElement[] = [];
  const states = statesFromCode(data.code, data.lstype);
  for (const [key, type] of LEGACY_REF_KEYS) {
    for (const ref of data[key] ?? []) {
      elements.push(legacyElement(ref, type));
      const substitution = SUBSTITUTION_STATE[type];
      if (ref.orgname && substitution) {
        states.add(substitution);
      }
    }
  }
  if (states.size === 0) {
    states.add(PeriodState.REGULAR);
  }

  const subjectNames = (data.su ?? [])
    .map((ref) => ref.longname ?? ref.name ?? "")
    .filter((name) => name !== "");

  return ok(
    {
      id: data.id,
      lessonId: data.lessonId ?? data.lsnumber ?? data.id,
      startDateTime: span.start,
      endDateTime: span.end,
      foreColor: DEFAULT_FORE_COLOR,
      backColor: DEFAULT_BACK_COLOR,
      innerForeColor: DEFAULT_FORE_COLOR,
      innerBackColor: DEFAULT_BACK_COLOR,
      text: {
        lesson:
          optionalText(data.lstext) ??
          (subjectNames.length > 0 ? subjectNames.join(", ") : undefined),
        substitution: optionalText(data.substText) ?? optionalText(data.bkText),
        info: optionalText(data.info) ?? optionalText(data.bkRemark),
      },
      elements,
      can: new Set<PeriodRight>(),
      is: states,
    },
    "structural",
  );
}

// Tier 3: whatever scalar fields a record has, under any known alias.

const ID_KEYS = ["id", "periodId", "lessonId", "lsnumber"];
const SPAN_KEYS = {
  date: ["date", "startDate", "day"],
  start: ["startDateTime", "startTime", "start", "from"],
  end: ["endDateTime", "endTime", "end", "to"],
};
const TEXT_KEYS = ["lstext", "lessonText", "name", "title", "subject"];
const RECOGNIZED_KEYS = new Set([
  ...ID_KEYS,
  ...SPAN_KEYS.date,
  ...SPAN_KEYS.start,
  ...SPAN_KEYS.end,
  ...TEXT_KEYS,
  "studentgroup",
  "activityType",
  "subjects",
  "su",
]);

const ELEMENT_ARRAY_KEYS: ReadonlyArray<readonly [string, ElementType]> = [
  ["kl", ElementType.CLASS],
  ["klassen", ElementType.CLASS],
  ["te", ElementType.TEACHER],
  ["teachers", ElementType.TEACHER],
  ["su", ElementType.SUBJECT],
  ["subjects", ElementType.SUBJECT],
  ["ro", ElementType.ROOM],
  ["rooms", ElementType.ROOM],
];

function looseElements(record: UnknownRecord): PeriodElement[] {
  const elements: PeriodElement[] = [];
  for (const [key, type] of ELEMENT_ARRAY_KEYS) {
    for (const item of recordsOf(record[key])) {
      const id = pickNumber(item, ["id"]);
      if (id === undefined) {
        continue;
      }
      const name = pickString(item, ["name", "shortName", "displayName"]) ?? "";
      elements.push({
        type,
        id,
        name,
        longName: pickString(item, ["longName", "longname", "displayName"]) ?? name,
      });
    }
  }
  return elements;
}

/** Display text when the record has none: group, activity, subjects, then a numbered label. */
function placeholderText(record: UnknownRecord, index: number): string {
  let text =
    pickString(record, ["studentgroup"]) ?? pickString(record, ["activityType"]);

  if (!text) {
    const subjects = pickArray(record, ["subjects", "su"]) ?? [];
    const named = recordsOf(subjects)
      .map((subject) => pickString(subject, ["name", "longName", "longname"]))
      .filter((name): name is string => name !== undefined);
    const ids = recordsOf(subjects)
      .map((subject) => pickNumber(subject, ["id"]))
      .filter((id): id is number => id !== undefined);
    const plain = stringsOf(subjects);

    if (named.length > 0) {
      text = named.join(", ");
    } else if (plain.length > 0) {
      text = plain.join(", ");
    } else if (ids.length > 0) {
      text = `Subject ${ids.join(", ")}`;
    }
  }

  text = text ?? `Course ${index + 1}`;

  const hoursPerWeek = toNumber(record.hpw);
  if (hoursPerWeek !== undefined && hoursPerWeek > 0) {
    text += ` (${hoursPerWeek}h/week)`;
  }
  return text;
}

export function reconstructPeriod(
  record: unknown,
  index: number,
  now: Date = new Date(),
): DecodeResult<Period> {
  if (!isRecord(record)) {
    return fail("not an object");
  }
  if (!Object.keys(record).some((key) => RECOGNIZED_KEYS.has(key))) {
    return fail("no recognizable period field");
  }

  // Negative placeholders never collide with server ids.
  const id = pickNumber(record, ID_KEYS) ?? -(index + 1);
  const span = resolveTimeSpan(record, SPAN_KEYS, now);
  const text: PeriodText = {
    lesson: pickString(record, TEXT_KEYS) ?? placeholderText(record, index),
    substitution: pickString(record, ["substText", "substitution", "bkText"]),
    info: pickString(record, ["info", "remark", "bkRemark", "periodInfo"]),
  };

  const states = enumSet(record.is, PERIOD_STATES);
  for (const state of statesFromCode(pickString(record, ["code"]), pickString(record, ["lstype"]))) {
    states.add(state);
  }

  return ok(
    {
      id,
      lessonId: pickNumber(record, ["lessonId", "lsnumber", "lessonNumber", "id"]) ?? id,
      startDateTime: span.start,
      endDateTime: span.end,
      foreColor: pickString(record, ["foreColor"]) ?? DEFAULT_FORE_COLOR,
      backColor: pickString(record, ["backColor", "color"]) ?? DEFAULT_BACK_COLOR,
      innerForeColor: pickString(record, ["innerForeColor"]) ?? DEFAULT_FORE_COLOR,
      innerBackColor: pickString(record, ["innerBackColor"]) ?? DEFAULT_BACK_COLOR,
      text,
      elements: looseElements(record),
      can: enumSet(record.can, PERIOD_RIGHTS),
      is: states,
    },
    "best-effort",
  );
}

/** Runs the three tiers on one record; never throws. */
export function decodePeriod(record: unknown, index: number, now?: Date): DecodeResult<Period> {
  try {
    const strict = decodeStrictPeriod(record);
    if (strict.ok) {
      return strict;
    }
    const legacy = decodeLegacyPeriod(record);
    if (legacy.ok) {
      return legacy;
    }
    return reconstructPeriod(record, index, now);
  } catch (error) {
    return fail(error instanceof Error ? error.message : "Unknown error");
  }
}

// REST view/v1 timetable entries: days[] with grid and day entries.

const ENTRY_STATUS: Record<string, PeriodState> = {
  CANCELLED: PeriodState.CANCELLED,
  EXAM: PeriodState.EXAM,
  IRREGULAR: PeriodState.IRREGULAR,
  SUBSTITUTION: PeriodState.TEACHERSUBSTITUTION,
  REGULAR: PeriodState.REGULAR,
};

const DAY_ENTRY_ID_OFFSET = 10000;
const ENTRY_POSITIONS = ["position1", "position2", "position3", "position4", "position5", "position6", "position7"];

function entryElements(entry: UnknownRecord): PeriodElement[] {
  const seen = new Set<string>();
  const elements: PeriodElement[] = [];

  for (const key of ENTRY_POSITIONS) {
    const value = entry[key];
    const slots = Array.isArray(value) ? recordsOf(value) : isRecord(value) ? [value] : [];
    for (const slot of slots) {
      const current = pickRecord(slot, ["current"]) ?? slot;
      const type = elementTypeFrom(pickValue(current, ["type"]));
      const id = pickNumber(current, ["id"]);
      if (!type || id === undefined) {
        continue;
      }
      const dedupeKey = `${type}-${id}`;
      if (seen.has(dedupeKey)) {
        continue;
      }
      seen.add(dedupeKey);

      const name = pickString(current, ["shortName", "shortText", "name", "text", "displayName"]) ?? "";
      elements.push({
        type,
        id,
        name,
        longName: pickString(current, ["longName", "text", "displayName"]) ?? name,
        displayName: pickString(current, ["displayName"]),
        foreColor: pickString(current, ["foreColor"]),
        backColor: pickString(current, ["backColor"]),
      });
    }
  }
  return elements;
}

function entryToPeriod(
  entry: UnknownRecord,
  index: number,
  day: Date | null,
  idOffset: number,
  now: Date,
): Period {
  const duration = pickRecord(entry, ["duration"]) ?? {};
  const span = resolveTimeSpan(
    { ...duration, day: day ?? undefined },
    { date: ["day"], start: ["start"], end: ["end"] },
    now,
  );
  const startSeconds = Math.floor(span.start.getTime() / 1000);
  const ids = pickArray(entry, ["ids"]) ?? [];
  const firstId = toNumber(ids[0]);
  const id = firstId ?? startSeconds + index + idOffset;

  const status = pickString(entry, ["status"])?.toUpperCase();
  const is = new Set<PeriodState>([
    (status && ENTRY_STATUS[status]) || PeriodState.REGULAR,
  ]);

  const elements = entryElements(entry);
  const subject = elements.find((element) => element.type === ElementType.SUBJECT);

  return {
    id,
    lessonId: firstId ?? id,
    startDateTime: span.start,
    endDateTime: span.end,
    foreColor: DEFAULT_FORE_COLOR,
    backColor: pickString(entry, ["color", "backColor"]) ?? DEFAULT_BACK_COLOR,
    innerForeColor: DEFAULT_FORE_COLOR,
    innerBackColor: DEFAULT_BACK_COLOR,
    text: {
      lesson: pickString(entry, ["name", "lessonText"]) ?? subject?.longName,
      substitution: pickString(entry, ["substitutionText", "statusDetail"]),
      info: pickString(entry, ["notesAll", "lessonInfo", "notesStaff"]),
    },
    elements,
    can: new Set<PeriodRight>(),
    is,
  };
}

export function normalizeTimetableEntries(days: UnknownRecord[], now: Date = new Date()): Period[] {
  const periods: Period[] = [];
  for (const day of days) {
    const date = parseCalendarDay(pickValue(day, ["date"]));
    recordsOf(day.gridEntries).forEach((entry, index) => {
      periods.push(entryToPeriod(entry, index, date, 0, now));
    });
    recordsOf(day.dayEntries).forEach((entry, index) => {
      periods.push(entryToPeriod(entry, index, date, DAY_ENTRY_ID_OFFSET, now));
    });
  }
  return periods;
}

// Timetable payloads

const PERIOD_LIST_PATHS = ["timetable.periods", "timetable", "periods", "lessons"];
const REST_V3_PATHS = ["data.result.elements", "result.elements", "elements"];

type LocatedPeriods =
  | { kind: "records"; records: unknown[] }
  | { kind: "days"; days: UnknownRecord[] }
  | { kind: "none" };

/**
 * Where the period list sits, checked in a fixed order: a bare array,
 * `timetable.periods`, `timetable`, `periods`, `lessons`, REST `days`,
 * REST v3 `elements`, then the sole array of a single-key object.
 */
export function locatePeriods(payload: unknown): LocatedPeriods {
  const records = locateArray(payload, PERIOD_LIST_PATHS);
  if (records) {
    return { kind: "records", records };
  }
  if (isRecord(payload) && Array.isArray(payload.days)) {
    return { kind: "days", days: recordsOf(payload.days) };
  }
  const v3 = locateArray(payload, REST_V3_PATHS) ?? soleArray(payload);
  if (v3) {
    return { kind: "records", records: v3 };
  }
  return { kind: "none" };
}

function fillElementNames(periods: Period[], masterData: MasterData): void {
  const lookup = new Map<string, { name: string; longName: string }>();
  for (const element of [
    ...masterData.klassen,
    ...masterData.teachers,
    ...masterData.subjects,
    ...masterData.rooms,
  ]) {
    lookup.set(`${element.type}-${element.id}`, element);
  }
  if (lookup.size === 0) {
    return;
  }
  for (const period of periods) {
    for (const element of period.elements) {
      const known = lookup.get(`${element.type}-${element.id}`);
      if (known && element.name === "") {
        element.name = known.name;
        element.longName = element.longName || known.longName;
      }
    }
  }
}

function displayRange(payload: unknown, range: DateRange): DateRange {
  const timetable = isRecord(payload) ? pickRecord(payload, ["timetable"]) : undefined;
  const from = timetable ? parseDateValue(timetable.displayableStartDate) : null;
  const to = timetable ? parseDateValue(timetable.displayableEndDate) : null;
  return { from: from ?? startOfDay(range.from), to: to ?? range.to };
}

/**
 * Canonical timetable from any server response. Never throws: records that
 * cannot be read at all are dropped and an unknown shape yields no periods.
 */
export function normalizeTimetable(
  payload: unknown,
  range: DateRange,
  now: Date = new Date(),
): Timetable {
  const { from, to } = displayRange(payload, range);
  const periods: Period[] = [];

  try {
    const strict = strictTimetableSchema.safeParse(payload);
    const located: LocatedPeriods = strict.success
      ? { kind: "records", records: strict.data.timetable.periods }
      : locatePeriods(payload);

    if (located.kind === "days") {
      periods.push(...normalizeTimetableEntries(located.days, now));
    } else if (located.kind === "records") {
      located.records.forEach((record, index) => {
        const decoded = decodePeriod(record, index, now);
        if (decoded.ok) {
          periods.push(decoded.value);
        } else {
          logger.debug(`[NORMALIZE] Dropped period at ${index}: ${decoded.reason}`);
        }
      });
    } else {
      logger.debug("[NORMALIZE] No period list found in timetable payload");
    }

    if (isRecord(payload) && isRecord(payload.masterData)) {
      fillElementNames(periods, normalizeMasterData(payload.masterData));
    }
  } catch (error) {
    logger.warn(
      "[WARNING] Timetable normalization stopped early:",
      error instanceof Error ? error.message : "Unknown error",
    );
  }

  return { displayableStartDate: from, displayableEndDate: to, periods };
}
