export enum CacheMode {
  NO_CACHE = "NO_CACHE",
  OFFLINE_ONLY = "OFFLINE_ONLY",
  ONLINE_ONLY = "ONLINE_ONLY",
  FULL_CACHE = "FULL_CACHE",
}

const CACHE_CONTROL: Record<CacheMode, string> = {
  [CacheMode.NO_CACHE]: "no-store",
  [CacheMode.OFFLINE_ONLY]: "only-if-cached",
  [CacheMode.ONLINE_ONLY]: "no-cache",
  [CacheMode.FULL_CACHE]: "public, max-age=60",
};

export function cacheControlFor(mode: CacheMode): string {
  return CACHE_CONTROL[mode];
}

export function parseCacheMode(value: string | undefined): CacheMode | null {
  const normalized = value?.trim().toUpperCase();
  for (const mode of Object.values(CacheMode)) {
    if (mode === normalized) {
      return mode;
    }
  }
  return null;
}

export type Dialect =
  | "json-rpc-public"
  | "json-rpc-internal"
  | "rest-v1"
  | "rest-v3";

export function isJsonRpcDialect(dialect: Dialect): boolean {
  return dialect === "json-rpc-public" || dialect === "json-rpc-internal";
}

export type HttpMethod = "GET" | "POST";

export interface Tenant {
  readonly host: string;
  readonly school: string;
}

export interface Endpoint {
  readonly dialect: Dialect;
  readonly url: string;
  readonly school: string;
}

export interface DateRange {
  from: Date;
  to: Date;
}

export enum ElementType {
  CLASS = "CLASS",
  TEACHER = "TEACHER",
  SUBJECT = "SUBJECT",
  ROOM = "ROOM",
  STUDENT = "STUDENT",
}

const LEGACY_ELEMENT_IDS: Record<ElementType, number> = {
  [ElementType.CLASS]: 1,
  [ElementType.TEACHER]: 2,
  [ElementType.SUBJECT]: 3,
  [ElementType.ROOM]: 4,
  [ElementType.STUDENT]: 5,
};

export function legacyElementTypeId(type: ElementType): number {
  return LEGACY_ELEMENT_IDS[type];
}

export function elementTypeFrom(value: unknown): ElementType | null {
  if (typeof value === "number") {
    for (const type of Object.values(ElementType)) {
      if (LEGACY_ELEMENT_IDS[type] === value) {
        return type;
      }
    }
    return null;
  }
  if (typeof value !== "string") {
    return null;
  }
  switch (value.trim().toUpperCase()) {
    case "1":
    case "CLASS":
    case "KLASSE":
      return ElementType.CLASS;
    case "2":
    case "TEACHER":
      return ElementType.TEACHER;
    case "3":
    case "SUBJECT":
      return ElementType.SUBJECT;
    case "4":
    case "ROOM":
      return ElementType.ROOM;
    case "5":
    case "STUDENT":
      return ElementType.STUDENT;
    default:
      return null;
  }
}

export enum PeriodRight {
  DELETE = "DELETE",
  EDIT = "EDIT",
  CREATE_ABSENCE = "CREATE_ABSENCE",
  EDIT_ABSENCE = "EDIT_ABSENCE",
  DELETE_ABSENCE = "DELETE_ABSENCE",
  CAN_VIEW_DETAILS = "CAN_VIEW_DETAILS",
}

export enum PeriodState {
  REGULAR = "REGULAR",
  CANCELLED = "CANCELLED",
  IRREGULAR = "IRREGULAR",
  EXAM = "EXAM",
  ROOMSUBSTITUTION = "ROOMSUBSTITUTION",
  TEACHERSUBSTITUTION = "TEACHERSUBSTITUTION",
  SUBJECTSUBSTITUTION = "SUBJECTSUBSTITUTION",
  BREAK = "BREAK",
}

export const DEFAULT_FORE_COLOR = "#000000";
export const DEFAULT_BACK_COLOR = "#FFFFFF";

export interface PeriodElement {
  type: ElementType;
  id: number;
  name: string;
  longName: string;
  displayName?: string;
  alternateName?: string;
  foreColor?: string;
  backColor?: string;
  orgId?: number;
  orgName?: string;
  missing?: boolean;
  state?: string;
}

export interface PeriodText {
  lesson?: string;
  substitution?: string;
  info?: string;
}

export interface PeriodExam {
  id: number;
  examType?: string;
  name?: string;
  text?: string;
}

export interface PeriodHomeWork {
  id: number;
  lessonId: number;
  startDate?: Date;
  endDate?: Date;
  text: string;
  remark?: string;
  completed: boolean;
}

export interface Period {
  id: number;
  lessonId: number;
  startDateTime: Date;
  endDateTime: Date;
  foreColor: string;
  backColor: string;
  innerForeColor: string;
  innerBackColor: string;
  text: PeriodText;
  elements: PeriodElement[];
  can: ReadonlySet<PeriodRight>;
  is: ReadonlySet<PeriodState>;
  homeWorks?: PeriodHomeWork[];
  exam?: PeriodExam;
  isOnlinePeriod?: boolean;
  onlinePeriodLink?: string;
  blockHash?: number;
}

export interface Timetable {
  displayableStartDate: Date;
  displayableEndDate: Date;
  periods: Period[];
}

export interface ElementSummary {
  type: ElementType;
  id: number;
  name: string;
  longName: string;
  alternateName?: string;
  foreColor?: string;
  backColor?: string;
  active: boolean;
}

export interface TimeGridUnit {
  label: string;
  startTime: string;
  endTime: string;
}

export interface TimeGridDay {
  day: number;
  units: TimeGridUnit[];
}

export interface SchoolYear {
  id: number;
  name: string;
  startDate: Date;
  endDate: Date;
}

export interface Holiday {
  id: number;
  name: string;
  longName: string;
  startDate: Date;
  endDate: Date;
}

export interface MasterData {
  timeStamp: number;
  klassen: ElementSummary[];
  rooms: ElementSummary[];
  subjects: ElementSummary[];
  teachers: ElementSummary[];
  timeGrid: TimeGridDay[];
  schoolYears: SchoolYear[];
  holidays: Holiday[];
}

export interface UserData {
  masterId: number | null;
  personType: ElementType | null;
  personId: number | null;
  displayName: string;
  schoolName: string;
  departmentId: number;
  klasseId: number | null;
  rights: string[];
  masterData: MasterData | null;
}

export interface MessageAttachment {
  id: number;
  name: string;
  url: string;
}

export interface MessageOfDay {
  id: number;
  subject: string;
  text: string;
  isExpired: boolean;
  isImportant: boolean;
  attachments: MessageAttachment[];
}

export interface Exam {
  id: number;
  examType?: string;
  name: string;
  text?: string;
  subject?: string;
  startDateTime: Date;
  endDateTime: Date;
  classes: string[];
  teachers: string[];
  rooms: string[];
}

export interface HomeWork {
  id: number;
  lessonId: number;
  subject?: string;
  text: string;
  remark?: string;
  date: Date;
  dueDate: Date;
  completed: boolean;
}

export interface StudentAbsence {
  id: number;
  startDateTime: Date;
  endDateTime: Date;
  reason?: string;
  text?: string;
  className?: string;
  isExcused?: boolean;
}

export interface SchoolSearchResult {
  schoolId: number;
  loginName: string;
  displayName: string;
  server: string;
  serverUrl: string;
  address?: string;
}

export interface Credentials {
  readonly user: string;
  readonly key: string;
  /** Set only for a JSON-RPC session; the JSESSIONID cookie. */
  readonly sessionId?: string;
  readonly bearerToken?: string;
  readonly refreshToken?: string;
  readonly personId?: number;
  readonly personType?: ElementType;
  readonly issuedAt: number;
}

export interface ElementRef {
  type: ElementType;
  id: number;
}

/** Inputs a logical operation may carry; each variant picks what it needs. */
export interface OperationInput {
  range?: DateRange;
  date?: Date;
  element?: ElementRef;
  username?: string;
  password?: string;
  query?: string;
  masterDataTimestamp?: number;
}

export type ParamBuilder = (
  input: OperationInput,
  credentials: Credentials | null,
) => Record<string, unknown>;

export interface EndpointCandidate {
  readonly dialect: Dialect;
  readonly url: string;
  readonly method: string;
  readonly rank: number;
  readonly httpMethod: HttpMethod;
  readonly buildParams: ParamBuilder;
}

export function candidateKey(candidate: EndpointCandidate): string {
  return `${candidate.dialect} ${candidate.httpMethod} ${candidate.url}#${candidate.method}`;
}

export type ResponseOutcome =
  | { kind: "success"; payload: unknown }
  | { kind: "not-supported"; reason: string }
  | { kind: "auth-failure"; reason: string; status?: number }
  | { kind: "transient-network-error"; reason: string; code?: string }
  | {
      kind: "fatal-server-error";
      message: string;
      code?: number;
      status?: number;
    };

export interface CandidateAttempt {
  candidate: EndpointCandidate;
  outcome: ResponseOutcome;
}

export interface DispatchRequest {
  params: Record<string, unknown>;
  credentials: Credentials | null;
  cacheMode: CacheMode;
}

export interface ProtocolClient {
  execute(
    candidate: EndpointCandidate,
    request: DispatchRequest,
    signal?: AbortSignal,
  ): Promise<ResponseOutcome>;
}
