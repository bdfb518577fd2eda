import type { AxiosInstance } from "axios";
import { CONFIG } from "./config.js";
import { InMemoryCredentialStore, type CredentialStore } from "./credential-manager.js";
import { defaultSchoolYear } from "./date-utils.js";
import {
  buildCandidates,
  makeTokenIdentifier,
  normalizeHost,
  resolveEndpoints,
  schoolSearchEndpoints,
} from "./endpoint-resolver.js";
import {
  AllCandidatesExhaustedError,
  FatalServerError,
  NotAuthenticatedError,
  RefreshUnavailableError,
} from "./errors.js";
import { FallbackOrchestrator } from "./fallback-orchestrator.js";
import { JsonRpcClient } from "./jsonrpc-client.js";
import { logger } from "./logger.js";
import { OPERATIONS, type OperationName } from "./operations.js";
import {
  normalizeAbsences,
  normalizeElementList,
  normalizeExams,
  normalizeHolidays,
  normalizeHomework,
  normalizeMessages,
  normalizeSchoolSearch,
  normalizeSchoolYear,
  normalizeSchoolYears,
  normalizeUserData,
} from "./record-normalizer.js";
import { isRecord, pickNumber, pickString, pickValue } from "./record-utils.js";
import { RestClient } from "./rest-client.js";
import { NoopTimetableCache, type TimetableCache } from "./timetable-cache.js";
import { normalizeTimetable } from "./timetable-normalizer.js";
import {
  CacheMode,
  ElementType,
  candidateKey,
  elementTypeFrom,
  type Credentials,
  type DateRange,
  type ElementRef,
  type ElementSummary,
  type Endpoint,
  type EndpointCandidate,
  type Exam,
  type Holiday,
  type HomeWork,
  type MessageOfDay,
  type OperationInput,
  type ProtocolClient,
  type SchoolSearchResult,
  type SchoolYear,
  type StudentAbsence,
  type Tenant,
  type Timetable,
  type UserData,
} from "./types.js";

export interface SessionOptions {
  tenant: Tenant;
  jsonRpc?: ProtocolClient;
  rest?: ProtocolClient;
  /** Shared by the default protocol clients; tests pass one with a fake adapter. */
  httpClient?: AxiosInstance;
  timeoutMs?: number;
  credentialStore?: CredentialStore;
  timetableCache?: TimetableCache;
  cacheMode?: CacheMode;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface TimetableOptions extends CallOptions {
  cacheMode?: CacheMode;
  /** Whose timetable; defaults to the logged-in person. */
  element?: ElementRef;
}

export type ElementKind = "rooms" | "klassen" | "teachers" | "subjects";

const ELEMENT_KIND_TYPES: Record<ElementKind, ElementType> = {
  rooms: ElementType.ROOM,
  klassen: ElementType.CLASS,
  teachers: ElementType.TEACHER,
  subjects: ElementType.SUBJECT,
};

export interface SessionStatus {
  baseUrl: string;
  school: string;
  user: string | null;
  authenticated: boolean;
  authMode: "json-rpc" | "bearer" | null;
  issuedAt: Date | null;
  pinned: Partial<Record<OperationName, string>>;
}

/**
 * Session from an authenticate answer: a JSON-RPC `sessionId` or a REST
 * access token. Null when the answer carries neither.
 */
export function credentialsFromLogin(
  user: string,
  payload: unknown,
  issuedAt: number = Date.now(),
): Credentials | null {
  if (!isRecord(payload)) {
    return null;
  }

  const sessionId = pickString(payload, ["sessionId", "sessionID"]);
  const token = pickString(payload, ["access_token", "accessToken", "jwt", "token"]);
  const key = sessionId ?? token;
  if (!key) {
    return null;
  }

  return Object.freeze({
    user,
    key,
    sessionId,
    bearerToken: token,
    refreshToken: pickString(payload, ["refresh_token", "refreshToken"]),
    personId: pickNumber(payload, ["personId", "personID"]),
    personType: elementTypeFrom(pickValue(payload, ["personType"])) ?? undefined,
    issuedAt,
  });
}

function usesCache(mode: CacheMode): boolean {
  return mode === CacheMode.OFFLINE_ONLY || mode === CacheMode.FULL_CACHE;
}

function storesCache(mode: CacheMode): boolean {
  return mode === CacheMode.ONLINE_ONLY || mode === CacheMode.FULL_CACHE;
}

/**
 * One user's connection to one school. Endpoints are resolved once at
 * creation; every data call goes through the fallback orchestrator and the
 * matching normalizer.
 */
export class UntisSession {
  private credentials: Credentials | null = null;
  private readonly pinned = new Map<OperationName, string>();
  private readonly orchestrator: FallbackOrchestrator;
  private readonly baseUrl: string;
  private readonly credentialStore: CredentialStore;
  private readonly timetableCache: TimetableCache;
  private readonly cacheMode: CacheMode;

  private constructor(
    private readonly tenant: Tenant,
    private readonly endpoints: readonly Endpoint[],
    options: SessionOptions,
  ) {
    const transport = { httpClient: options.httpClient, timeoutMs: options.timeoutMs };
    this.orchestrator = new FallbackOrchestrator({
      jsonRpc: options.jsonRpc ?? new JsonRpcClient(transport),
      rest: options.rest ?? new RestClient(transport),
    });
    this.baseUrl = normalizeHost(tenant.host);
    this.credentialStore = options.credentialStore ?? new InMemoryCredentialStore();
    this.timetableCache = options.timetableCache ?? new NoopTimetableCache();
    this.cacheMode = options.cacheMode ?? CONFIG.untis.cacheMode;
  }

  /** Throws MissingSchoolError or NoValidEndpointsError for a bad tenant. */
  static create(options: SessionOptions): UntisSession {
    const endpoints = resolveEndpoints(options.tenant);
    logger.info(
      `[INFO] Session for ${options.tenant.school} with ${endpoints.length} endpoints`,
    );
    return new UntisSession(options.tenant, endpoints, options);
  }

  get isAuthenticated(): boolean {
    return this.credentials !== null;
  }

  get currentCredentials(): Credentials | null {
    return this.credentials;
  }

  tenantUserId(user: string): string {
    return makeTokenIdentifier(this.baseUrl, this.tenant.school, user);
  }

  status(): SessionStatus {
    const pinned: Partial<Record<OperationName, string>> = {};
    for (const [operation, key] of this.pinned) {
      pinned[operation] = key;
    }
    return {
      baseUrl: this.baseUrl,
      school: this.tenant.school,
      user: this.credentials?.user ?? null,
      authenticated: this.credentials !== null,
      authMode: this.credentials
        ? this.credentials.bearerToken
          ? "bearer"
          : "json-rpc"
        : null,
      issuedAt: this.credentials ? new Date(this.credentials.issuedAt) : null,
      pinned,
    };
  }

  async login(user: string, password: string, options: CallOptions = {}): Promise<Credentials> {
    logger.info(`[INFO] Logging in ${user} at ${this.tenant.school}`);
    const payload = await this.run("authenticate", { username: user, password }, options);

    const credentials = credentialsFromLogin(user, payload);
    if (!credentials) {
      throw new FatalServerError(
        "authenticate",
        "Login answer carried neither a session id nor a token",
        [],
      );
    }
    this.credentials = credentials;

    const saved = await this.credentialStore.save(this.tenantUserId(user), credentials);
    if (!saved) {
      logger.warn(`[WARNING] Credential store did not keep the session for ${user}`);
    }
    logger.info(`[SUCCESS] Logged in as ${user}`);
    return credentials;
  }

  /**
   * Trades the refresh token for a new access token. The new credentials
   * replace the old ones only for calls started afterwards.
   */
  async refresh(options: CallOptions = {}): Promise<Credentials> {
    const current = this.requireCredentials("refresh");
    if (!current.refreshToken) {
      throw new RefreshUnavailableError(current.user);
    }

    const payload = await this.run("refresh", {}, options, this.cacheMode, {
      ...current,
      bearerToken: current.refreshToken,
    });

    const fresh = credentialsFromLogin(current.user, payload);
    if (!fresh) {
      throw new FatalServerError("refresh", "Refresh answer carried no token", []);
    }
    const credentials: Credentials = Object.freeze({
      ...fresh,
      refreshToken: fresh.refreshToken ?? current.refreshToken,
      personId: fresh.personId ?? current.personId,
      personType: fresh.personType ?? current.personType,
    });
    this.credentials = credentials;

    const saved = await this.credentialStore.save(this.tenantUserId(current.user), credentials);
    if (!saved) {
      logger.warn(`[WARNING] Credential store did not keep the refreshed session for ${current.user}`);
    }
    logger.info(`[INFO] Refreshed session for ${current.user}`);
    return credentials;
  }

  /** Picks up a stored session; false when the store has none. */
  async restore(user: string): Promise<boolean> {
    const stored = await this.credentialStore.load(this.tenantUserId(user));
    if (!stored) {
      return false;
    }
    this.credentials = stored;
    logger.info(`[INFO] Restored session for ${user}`);
    return true;
  }

  async logout(options: CallOptions = {}): Promise<void> {
    const credentials = this.credentials;
    if (!credentials) {
      return;
    }

    try {
      await this.run("logout", {}, options);
    } catch (error) {
      logger.warn(
        "[WARNING] Server logout failed:",
        error instanceof Error ? error.message : "Unknown error",
      );
    }

    await this.credentialStore.delete(this.tenantUserId(credentials.user));
    this.credentials = null;
    this.pinned.clear();
    logger.info(`[INFO] Logged out ${credentials.user}`);
  }

  async getTimetable(range: DateRange, options: TimetableOptions = {}): Promise<Timetable> {
    const credentials = this.requireCredentials("timetable");
    const mode = options.cacheMode ?? this.cacheMode;
    const cacheKey = this.tenantUserId(credentials.user);

    if (usesCache(mode)) {
      const cached = await this.loadCached(cacheKey, range);
      if (cached) {
        logger.info(`[CACHE] Timetable served from cache (${mode})`);
        return cached;
      }
    }

    const payload = await this.run(
      "timetable",
      { range, element: options.element },
      options,
      mode,
    );
    const timetable = normalizeTimetable(payload, range);

    if (storesCache(mode)) {
      await this.storeCached(cacheKey, timetable);
    }
    return timetable;
  }

  async getUserData(options: CallOptions = {}): Promise<UserData> {
    return normalizeUserData(await this.run("userData", {}, options));
  }

  async getMessagesOfDay(date: Date = new Date(), options: CallOptions = {}): Promise<MessageOfDay[]> {
    return normalizeMessages(await this.run("messagesOfDay", { date }, options));
  }

  async getExams(range: DateRange, options: CallOptions = {}): Promise<Exam[]> {
    return normalizeExams(await this.run("exams", { range }, options));
  }

  async getHomework(range: DateRange, options: CallOptions = {}): Promise<HomeWork[]> {
    return normalizeHomework(await this.run("homework", { range }, options));
  }

  async getAbsences(range: DateRange, options: CallOptions = {}): Promise<StudentAbsence[]> {
    return normalizeAbsences(await this.run("absences", { range }, options));
  }

  async getElements(kind: ElementKind, options: CallOptions = {}): Promise<ElementSummary[]> {
    const payload = await this.run(kind, {}, options);
    return normalizeElementList(payload, ELEMENT_KIND_TYPES[kind]);
  }

  /**
   * The school year the server reports, or September to August of the
   * current year when no candidate could answer.
   */
  async getCurrentSchoolYear(options: CallOptions = {}): Promise<SchoolYear> {
    let payload: unknown;
    try {
      payload = await this.run("currentSchoolYear", {}, options);
    } catch (error) {
      if (error instanceof AllCandidatesExhaustedError) {
        logger.warn("[WARNING] No school year endpoint answered, using the default school year");
        return defaultSchoolYear();
      }
      throw error;
    }

    const schoolYear = normalizeSchoolYear(payload);
    if (!schoolYear) {
      logger.warn("[WARNING] Unreadable school year answer, using the default school year");
      return defaultSchoolYear();
    }
    return schoolYear;
  }

  async getSchoolYears(options: CallOptions = {}): Promise<SchoolYear[]> {
    return normalizeSchoolYears(await this.run("schoolYears", {}, options));
  }

  async getHolidays(options: CallOptions = {}): Promise<Holiday[]> {
    return normalizeHolidays(await this.run("holidays", {}, options));
  }

  private requireCredentials(operation: OperationName): Credentials {
    if (!this.credentials) {
      throw new NotAuthenticatedError(operation);
    }
    return this.credentials;
  }

  /** The pinned candidate first, the rest in their original order. */
  private orderCandidates(
    operation: OperationName,
    candidates: EndpointCandidate[],
  ): EndpointCandidate[] {
    const pinnedKey = this.pinned.get(operation);
    const index = pinnedKey
      ? candidates.findIndex((candidate) => candidateKey(candidate) === pinnedKey)
      : -1;
    if (index <= 0) {
      return candidates;
    }

    const reordered = [
      candidates[index],
      ...candidates.slice(0, index),
      ...candidates.slice(index + 1),
    ];
    return reordered.map((candidate, rank) => ({ ...candidate, rank }));
  }

  private async run(
    operation: OperationName,
    input: OperationInput,
    options: CallOptions,
    cacheMode: CacheMode = this.cacheMode,
    override?: Credentials,
  ): Promise<unknown> {
    const descriptor = OPERATIONS[operation];
    const credentials = descriptor.requiresAuth
      ? (override ?? this.requireCredentials(operation))
      : null;

    const candidates = this.orderCandidates(
      operation,
      buildCandidates(this.endpoints, descriptor, {
        hasBearerToken: Boolean(credentials?.bearerToken),
      }),
    );

    const result = await this.orchestrator.execute(
      operation,
      candidates,
      { input, credentials, cacheMode },
      options.signal,
    );
    this.pinned.set(operation, candidateKey(result.candidate));
    return result.payload;
  }

  private async loadCached(cacheKey: string, range: DateRange): Promise<Timetable | null> {
    try {
      return await this.timetableCache.loadCached(cacheKey, range);
    } catch (error) {
      logger.warn(
        "[CACHE] Cache lookup failed:",
        error instanceof Error ? error.message : "Unknown error",
      );
      return null;
    }
  }

  private async storeCached(cacheKey: string, timetable: Timetable): Promise<void> {
    try {
      const result = await this.timetableCache.store(cacheKey, timetable);
      if (!result.ok) {
        logger.warn(`[CACHE] Timetable not cached: ${result.reason ?? "no reason given"}`);
      }
    } catch (error) {
      logger.warn(
        "[CACHE] Cache write failed:",
        error instanceof Error ? error.message : "Unknown error",
      );
    }
  }
}

export interface SchoolSearchDeps extends CallOptions {
  jsonRpc?: ProtocolClient;
  httpClient?: AxiosInstance;
  urls?: readonly string[];
}

/** Looks schools up in the public directory; needs no tenant or login. */
export async function searchSchools(
  query: string,
  deps: SchoolSearchDeps = {},
): Promise<SchoolSearchResult[]> {
  const search = query.trim();
  if (search === "") {
    return [];
  }

  const jsonRpc = deps.jsonRpc ?? new JsonRpcClient({ httpClient: deps.httpClient });
  const orchestrator = new FallbackOrchestrator({
    jsonRpc,
    rest: new RestClient({ httpClient: deps.httpClient }),
  });
  const candidates = buildCandidates(
    schoolSearchEndpoints(deps.urls ?? CONFIG.untis.schoolSearchUrls),
    OPERATIONS.searchSchools,
    { hasBearerToken: false },
  );

  const result = await orchestrator.execute(
    "searchSchools",
    candidates,
    { input: { query: search }, credentials: null, cacheMode: CacheMode.NO_CACHE },
    deps.signal,
  );
  return normalizeSchoolSearch(result.payload);
}
