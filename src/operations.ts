import { CONFIG } from "./config.js";
import {
  formatCompactDate,
  formatIsoDate,
  formatIsoDateTime,
  createSingleDayRange,
} from "./date-utils.js";
import {
  ElementType,
  legacyElementTypeId,
  type Credentials,
  type DateRange,
  type Dialect,
  type ElementRef,
  type HttpMethod,
  type OperationInput,
  type ParamBuilder,
} from "./types.js";

export type OperationName =
  | "authenticate"
  | "refresh"
  | "logout"
  | "timetable"
  | "userData"
  | "messagesOfDay"
  | "exams"
  | "homework"
  | "absences"
  | "rooms"
  | "klassen"
  | "teachers"
  | "subjects"
  | "currentSchoolYear"
  | "schoolYears"
  | "holidays"
  | "searchSchools";

export interface OperationVariant {
  dialect: Dialect;
  /** JSON-RPC method name, or REST path below `/WebUntis` (`{school}` is substituted). */
  method: string;
  httpMethod: HttpMethod;
  params: ParamBuilder;
}

export interface OperationDescriptor {
  name: OperationName;
  requiresAuth: boolean;
  variants: readonly OperationVariant[];
}

function withAuth(
  params: Record<string, unknown>,
  credentials: Credentials | null,
): Record<string, unknown> {
  if (!credentials) {
    return params;
  }
  return { ...params, auth: { user: credentials.user, key: credentials.key } };
}

function rangeOf(input: OperationInput): DateRange {
  return input.range ?? createSingleDayRange(input.date ?? new Date());
}

function elementOf(
  input: OperationInput,
  credentials: Credentials | null,
): ElementRef {
  if (input.element) {
    return input.element;
  }
  return {
    type: credentials?.personType ?? ElementType.STUDENT,
    id: credentials?.personId ?? 0,
  };
}

// Param builders

const authOnly: ParamBuilder = (_input, credentials) =>
  withAuth({}, credentials);

const rpcLogin: ParamBuilder = (input) => ({
  user: input.username ?? "",
  password: input.password ?? "",
  client: CONFIG.client.applicationId,
});

const restLogin: ParamBuilder = (input) => ({
  username: input.username ?? "",
  password: input.password ?? "",
  client_id: "MOBILE",
  grant_type: "password",
});

/** Absences of the student service; the body names the student and an ISO date range. */
const restAbsences: ParamBuilder = (input, credentials) => {
  const range = rangeOf(input);
  const element = elementOf(input, credentials);
  return {
    dateRange: { start: formatIsoDate(range.from), end: formatIsoDate(range.to) },
    studentId: element.id,
  };
};

const restTimetableEntries: ParamBuilder = (input, credentials) => {
  const range = rangeOf(input);
  const element = elementOf(input, credentials);
  return {
    start: formatIsoDate(range.from),
    end: formatIsoDate(range.to),
    resourceType: element.type,
    resources: [element.id],
    layout: "START_TIME",
  };
};

const restV3Timetable: ParamBuilder = (input, credentials) => {
  const range = rangeOf(input);
  const element = elementOf(input, credentials);
  return {
    start: formatIsoDateTime(range.from),
    end: formatIsoDateTime(range.to),
    limit: 100,
    offset: 0,
    [element.type.toLowerCase()]: element.id,
  };
};

/** Mobile API methods take ISO dates and the element as a typed reference. */
const elementRange2017: ParamBuilder = (input, credentials) => {
  const range = rangeOf(input);
  const element = elementOf(input, credentials);
  return withAuth(
    {
      id: element.id,
      type: element.type,
      startDate: formatIsoDate(range.from),
      endDate: formatIsoDate(range.to),
    },
    credentials,
  );
};

const timetable2017: ParamBuilder = (input, credentials) => ({
  ...elementRange2017(input, credentials),
  masterDataTimestamp: input.masterDataTimestamp ?? 0,
  timetableTimestamp: 0,
  timetableTimestamps: [],
});

/** Public API methods take numeric `yyyyMMdd` dates and numeric element types. */
const legacyElementRange: ParamBuilder = (input, credentials) => {
  const range = rangeOf(input);
  const element = elementOf(input, credentials);
  return withAuth(
    {
      id: element.id,
      type: legacyElementTypeId(element.type),
      startDate: Number(formatCompactDate(range.from)),
      endDate: Number(formatCompactDate(range.to)),
    },
    credentials,
  );
};

const legacyRange: ParamBuilder = (input, credentials) => {
  const range = rangeOf(input);
  return withAuth(
    {
      startDate: Number(formatCompactDate(range.from)),
      endDate: Number(formatCompactDate(range.to)),
    },
    credentials,
  );
};

const legacyExamRange: ParamBuilder = (input, credentials) => ({
  ...legacyRange(input, credentials),
  examTypeId: 0,
});

const absences2017: ParamBuilder = (input, credentials) => {
  const range = rangeOf(input);
  return withAuth(
    {
      startDate: formatIsoDate(range.from),
      endDate: formatIsoDate(range.to),
      includeExcused: true,
      includeUnExcused: true,
    },
    credentials,
  );
};

const messagesForDate2017: ParamBuilder = (input, credentials) =>
  withAuth({ date: formatIsoDate(input.date ?? new Date()) }, credentials);

const legacyMessagesForDate: ParamBuilder = (input, credentials) =>
  withAuth(
    { date: Number(formatCompactDate(input.date ?? new Date())) },
    credentials,
  );

const schoolQuery: ParamBuilder = (input) => ({ search: input.query ?? "" });

// Variant helpers

const JSON_RPC_DIALECTS: readonly Dialect[] = [
  "json-rpc-public",
  "json-rpc-internal",
];

/** Every method on the public endpoint first, then every method on the internal one. */
function rpc(
  methods: ReadonlyArray<readonly [string, ParamBuilder]>,
): OperationVariant[] {
  return JSON_RPC_DIALECTS.flatMap((dialect) =>
    methods.map(([method, params]) => ({
      dialect,
      method,
      httpMethod: "POST" as const,
      params,
    })),
  );
}

function rest(
  dialect: Dialect,
  httpMethod: HttpMethod,
  path: string,
  params: ParamBuilder,
): OperationVariant {
  return { dialect, method: path, httpMethod, params };
}

function list(...methods: string[]): OperationVariant[] {
  return rpc(methods.map((method) => [method, authOnly] as const));
}

export const OPERATIONS: Readonly<Record<OperationName, OperationDescriptor>> =
  {
    authenticate: {
      name: "authenticate",
      requiresAuth: false,
      variants: [
        ...rpc([["authenticate", rpcLogin]]),
        rest(
          "rest-v1",
          "POST",
          "/api/mobile/v2/{school}/authentication",
          restLogin,
        ),
      ],
    },
    refresh: {
      name: "refresh",
      requiresAuth: true,
      variants: [
        rest(
          "rest-v1",
          "POST",
          "/api/mobile/v2/{school}/authentication/refresh",
          () => ({}),
        ),
      ],
    },
    logout: {
      name: "logout",
      requiresAuth: true,
      variants: list("logout"),
    },
    timetable: {
      name: "timetable",
      requiresAuth: true,
      variants: [
        rest(
          "rest-v1",
          "GET",
          "/api/rest/view/v1/timetable/entries",
          restTimetableEntries,
        ),
        rest("rest-v3", "GET", "/api/rest/extern/v3/timetable", restV3Timetable),
        ...rpc([
          ["getTimetable2017", timetable2017],
          ["getTimetable", legacyElementRange],
          ["getOwnTimetableForToday", authOnly],
          ["getTimetableForToday", authOnly],
          ["getTimetableForElement", legacyElementRange],
          ["getTimetableData", legacyElementRange],
          ["getLessons", legacyElementRange],
          ["getPeriods", legacyElementRange],
          ["getMyTimetable", legacyRange],
          ["getStudentTimetable", legacyElementRange],
          ["getCurrentTimetable", authOnly],
        ]),
      ],
    },
    userData: {
      name: "userData",
      requiresAuth: true,
      variants: [
        rest("rest-v1", "GET", "/api/rest/view/v1/mobile/data", () => ({})),
        ...rpc([
          ["getUserData2017", authOnly],
          ["getUserData", authOnly],
        ]),
      ],
    },
    messagesOfDay: {
      name: "messagesOfDay",
      requiresAuth: true,
      variants: rpc([
        ["getMessagesOfDay2017", messagesForDate2017],
        ["getMessages", legacyMessagesForDate],
        ["getNewsOfDay", legacyMessagesForDate],
      ]),
    },
    exams: {
      name: "exams",
      requiresAuth: true,
      variants: rpc([
        ["getExams2017", elementRange2017],
        ["getExams", legacyExamRange],
        ["getTests", legacyRange],
        ["getExaminations", legacyRange],
      ]),
    },
    homework: {
      name: "homework",
      requiresAuth: true,
      variants: rpc([
        ["getHomeWork2017", elementRange2017],
        ["getHomework2017", elementRange2017],
        ["getHomeWork", legacyRange],
        ["getHomework", legacyRange],
        ["getAssignments", legacyRange],
      ]),
    },
    absences: {
      name: "absences",
      requiresAuth: true,
      variants: [
        rest("rest-v1", "POST", "/api/rest/view/v4/classreg/absences", restAbsences),
        ...rpc([
          ["getStudentAbsences2017", absences2017],
          ["getStudentAbsences", legacyRange],
          ["getAbsences2017", absences2017],
          ["getAbsences", legacyRange],
        ]),
      ],
    },
    rooms: {
      name: "rooms",
      requiresAuth: true,
      variants: list("getRooms", "getRoomList", "getAllRooms"),
    },
    klassen: {
      name: "klassen",
      requiresAuth: true,
      variants: list("getKlassen", "getClasses", "getAllClasses"),
    },
    teachers: {
      name: "teachers",
      requiresAuth: true,
      variants: list("getTeachers", "getAllTeachers", "getTeacherList"),
    },
    subjects: {
      name: "subjects",
      requiresAuth: true,
      variants: list("getSubjects", "getAllSubjects", "getSubjectList"),
    },
    currentSchoolYear: {
      name: "currentSchoolYear",
      requiresAuth: true,
      variants: list("getCurrentSchoolyear", "getCurrentSchoolYear"),
    },
    schoolYears: {
      name: "schoolYears",
      requiresAuth: true,
      variants: list("getSchoolyears", "getSchoolYears"),
    },
    holidays: {
      name: "holidays",
      requiresAuth: true,
      variants: list("getHolidays"),
    },
    searchSchools: {
      name: "searchSchools",
      requiresAuth: false,
      variants: [
        {
          dialect: "json-rpc-public",
          method: "searchSchools",
          httpMethod: "POST",
          params: schoolQuery,
        },
      ],
    },
  };
