import { describe, expect, it } from "vitest";
import { InMemoryCredentialStore } from "../src/credential-manager.js";
import { defaultSchoolYear } from "../src/date-utils.js";
import {
  AuthFailureError,
  FatalServerError,
  MissingSchoolError,
  NotAuthenticatedError,
  OperationCancelledError,
  RefreshUnavailableError,
} from "../src/errors.js";
import type { CacheStoreResult, TimetableCache } from "../src/timetable-cache.js";
import { CacheMode, ElementType, type Timetable } from "../src/types.js";
import { UntisSession, credentialsFromLogin, searchSchools } from "../src/untis-session.js";
import {
  METHOD_MISSING,
  createFakeHttp,
  rpcError,
  rpcResult,
  type RecordedRequest,
  type Reply,
} from "./helpers/fake-http.js";

const tenant = { host: "demo.webuntis.com", school: "example-school" };
const range = { from: new Date(2025, 2, 10), to: new Date(2025, 2, 14, 23, 59, 59, 999) };
const PUBLIC_URL = "https://demo.webuntis.com/WebUntis/jsonrpc.do?school=example-school";

const legacyPeriod = { id: 1, date: 20250310, startTime: 800, endTime: 845, su: [{ id: 3, name: "MA" }] };

/** A server that only knows the old public API methods. */
function legacyServer(overrides: Record<string, Reply> = {}) {
  return (request: RecordedRequest): Reply => {
    const method = request.rpcMethod ?? "";
    if (method in overrides) {
      return overrides[method];
    }
    switch (method) {
      case "authenticate":
        return rpcResult({ sessionId: "test-session", personType: 5, personId: 42 });
      case "getTimetable":
        return rpcResult([legacyPeriod]);
      case "getUserData":
        return rpcResult({ userData: { displayName: "Jane Doe", elemType: "STUDENT", elemId: 42 } });
      case "logout":
        return rpcResult(null);
      default:
        return METHOD_MISSING;
    }
  };
}

/** A server that logs in over REST only; unknown REST paths answer 404. */
function restServer(overrides: Record<string, Reply> = {}) {
  return (request: RecordedRequest): Reply => {
    for (const [suffix, reply] of Object.entries(overrides)) {
      if (request.url.endsWith(suffix)) {
        return reply;
      }
    }
    if (request.url.endsWith("/api/mobile/v2/example-school/authentication")) {
      return { body: { access_token: "test-token", refresh_token: "test-refresh" } };
    }
    if (request.url.endsWith("/api/mobile/v2/example-school/authentication/refresh")) {
      return { body: { access_token: "test-token-2", refresh_token: "test-refresh-2" } };
    }
    if (request.url.endsWith("/api/rest/view/v1/timetable/entries")) {
      return { body: { days: [] } };
    }
    if (request.rpcMethod === "getUserData2017") {
      return rpcResult({ userData: { displayName: "Jane Doe" } });
    }
    return request.rpcMethod ? METHOD_MISSING : { status: 404, body: {} };
  };
}

class RecordingCache implements TimetableCache {
  loads = 0;
  stored: Timetable[] = [];

  constructor(
    private readonly hit: Timetable | null = null,
    private readonly failing = false,
  ) {}

  async loadCached(): Promise<Timetable | null> {
    this.loads++;
    if (this.failing) {
      throw new Error("disk full");
    }
    return this.hit;
  }

  async store(_tenantUserId: string, timetable: Timetable): Promise<CacheStoreResult> {
    if (this.failing) {
      throw new Error("disk full");
    }
    this.stored.push(timetable);
    return { ok: true };
  }
}

async function loggedIn(options: {
  responder?: (request: RecordedRequest) => Reply;
  cache?: TimetableCache;
  cacheMode?: CacheMode;
  credentialStore?: InMemoryCredentialStore;
} = {}) {
  const http = createFakeHttp(options.responder ?? legacyServer());
  const session = UntisSession.create({
    tenant,
    httpClient: http.client,
    credentialStore: options.credentialStore,
    timetableCache: options.cache,
    cacheMode: options.cacheMode ?? CacheMode.NO_CACHE,
  });
  await session.login("Jane.Doe", "test-secret");
  return { http, session };
}

describe("credentialsFromLogin", () => {
  it("reads a JSON-RPC session", () => {
    expect(credentialsFromLogin("Jane.Doe", { sessionId: "abc", personType: 5, personId: 42 }, 7)).toEqual({
      user: "Jane.Doe",
      key: "abc",
      sessionId: "abc",
      bearerToken: undefined,
      refreshToken: undefined,
      personId: 42,
      personType: ElementType.STUDENT,
      issuedAt: 7,
    });
  });

  it("reads a REST token", () => {
    expect(credentialsFromLogin("Jane.Doe", { access_token: "test-token" }, 7)).toMatchObject({
      key: "test-token",
      sessionId: undefined,
      bearerToken: "test-token",
    });
  });

  it("returns null without either", () => {
    expect(credentialsFromLogin("Jane.Doe", { result: "ok" })).toBeNull();
  });
});

describe("UntisSession", () => {
  it("refuses to build a session without a school", () => {
    expect(() => UntisSession.create({ tenant: { host: "demo.webuntis.com", school: "" } })).toThrow(
      MissingSchoolError,
    );
  });

  it("logs in and falls back to the timetable method an old server knows", async () => {
    const { http, session } = await loggedIn();

    const timetable = await session.getTimetable(range);

    expect(timetable.periods.map((period) => period.id)).toEqual([1]);
    expect(http.requests.map((request) => request.rpcMethod)).toEqual([
      "authenticate",
      "getTimetable2017",
      "getTimetable",
    ]);
    const sent = http.requests[2];
    expect(sent.url).toBe(PUBLIC_URL);
    expect(sent.header("Cookie")).toBe("JSESSIONID=test-session");
    expect(sent.body).toMatchObject({
      params: [
        {
          id: 42,
          type: 5,
          startDate: 20250310,
          endDate: 20250314,
          auth: { user: "Jane.Doe", key: "test-session" },
        },
      ],
    });
  });

  it("pins the winning candidate for later calls", async () => {
    const { http, session } = await loggedIn();

    await session.getTimetable(range);
    await session.getTimetable(range);

    expect(http.requests.slice(3).map((request) => request.rpcMethod)).toEqual(["getTimetable"]);
    expect(session.status().pinned.timetable).toBe(`json-rpc-public POST ${PUBLIC_URL}#getTimetable`);
  });

  it("requires a login for data operations", async () => {
    const http = createFakeHttp(legacyServer());
    const session = UntisSession.create({ tenant, httpClient: http.client });

    await expect(session.getTimetable(range)).rejects.toBeInstanceOf(NotAuthenticatedError);
    expect(http.requests).toHaveLength(0);
  });

  it("stops at the first rejected session", async () => {
    const { http, session } = await loggedIn({
      responder: legacyServer({ getUserData2017: rpcError(-8520, "not authenticated") }),
    });

    await expect(session.getUserData()).rejects.toBeInstanceOf(AuthFailureError);
    expect(http.requests.map((request) => request.rpcMethod)).toEqual(["authenticate", "getUserData2017"]);
  });

  it("logs in over REST and sends the bearer token and cache headers", async () => {
    const { http, session } = await loggedIn({ responder: restServer(), cacheMode: CacheMode.ONLINE_ONLY });

    expect(session.currentCredentials).toMatchObject({
      key: "test-token",
      bearerToken: "test-token",
      refreshToken: "test-refresh",
    });

    await session.getTimetable(range);

    const sent = http.requests[http.requests.length - 1];
    expect(sent.method).toBe("GET");
    expect(sent.url).toBe("https://demo.webuntis.com/WebUntis/api/rest/view/v1/timetable/entries");
    expect(sent.params).toEqual({
      start: "2025-03-10",
      end: "2025-03-14",
      resourceType: "STUDENT",
      resources: [0],
      layout: "START_TIME",
    });
    expect(sent.header("Authorization")).toBe("Bearer test-token");
    expect(sent.header("Cache-Control")).toBe("no-cache");
    expect(session.status().authMode).toBe("bearer");
  });

  it("stops after one request when the first REST candidate answers 401", async () => {
    const { http, session } = await loggedIn({
      responder: restServer({
        "/api/rest/view/v1/timetable/entries": { status: 401, body: { message: "token expired" } },
      }),
    });
    const before = http.requests.length;

    await expect(session.getTimetable(range)).rejects.toBeInstanceOf(AuthFailureError);
    expect(http.requests.length - before).toBe(1);
  });

  it("sends no session cookie on JSON-RPC fallbacks of a REST login", async () => {
    const { http, session } = await loggedIn({ responder: restServer() });

    expect((await session.getUserData()).displayName).toBe("Jane Doe");

    const sent = http.requests.find((request) => request.rpcMethod === "getUserData2017");
    expect(sent?.header("Cookie")).toBeUndefined();
    expect(sent?.body).toMatchObject({ params: [{ auth: { user: "Jane.Doe", key: "test-token" } }] });
  });

  it("refreshes a REST session for later calls only", async () => {
    const store = new InMemoryCredentialStore();
    const { http, session } = await loggedIn({ responder: restServer(), credentialStore: store });
    const timetableCalls = () =>
      http.requests.filter((request) => request.url.endsWith("/api/rest/view/v1/timetable/entries"));

    const inFlight = session.getTimetable(range);
    const refreshed = await session.refresh();
    await inFlight;
    await session.getTimetable(range);

    expect(refreshed).toMatchObject({
      key: "test-token-2",
      bearerToken: "test-token-2",
      refreshToken: "test-refresh-2",
    });
    expect(Object.isFrozen(refreshed)).toBe(true);
    expect(session.currentCredentials).toBe(refreshed);
    expect(await store.load(session.tenantUserId("Jane.Doe"))).toBe(refreshed);

    const refreshCall = http.requests.find((request) => request.url.endsWith("/authentication/refresh"));
    expect(refreshCall?.header("Authorization")).toBe("Bearer test-refresh");
    expect(timetableCalls().map((request) => request.header("Authorization"))).toEqual([
      "Bearer test-token",
      "Bearer test-token-2",
    ]);
  });

  it("cannot refresh a JSON-RPC session", async () => {
    const { http, session } = await loggedIn();

    await expect(session.refresh()).rejects.toBeInstanceOf(RefreshUnavailableError);
    expect(http.requests).toHaveLength(1);
  });

  it("falls back to the default school year once every candidate is exhausted", async () => {
    const { session } = await loggedIn();
    expect(await session.getCurrentSchoolYear()).toEqual(defaultSchoolYear());
  });

  it("does not hide server errors behind the default school year", async () => {
    const { session } = await loggedIn({
      responder: legacyServer({ getCurrentSchoolyear: rpcError(-7004, "no school year") }),
    });
    await expect(session.getCurrentSchoolYear()).rejects.toBeInstanceOf(FatalServerError);
  });

  it("maps element lists to the requested kind", async () => {
    const { session } = await loggedIn({
      responder: legacyServer({ getRooms: rpcResult([{ id: 9, name: "R101" }]) }),
    });
    const rooms = await session.getElements("rooms");
    expect(rooms.map((room) => [room.type, room.id, room.name])).toEqual([[ElementType.ROOM, 9, "R101"]]);
  });

  it("honours cancellation", async () => {
    const { session } = await loggedIn();
    const controller = new AbortController();
    controller.abort();
    await expect(session.getUserData({ signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
  });

  it("stores the session and restores it in a new session", async () => {
    const store = new InMemoryCredentialStore();
    const http = createFakeHttp(legacyServer());
    const first = UntisSession.create({ tenant, httpClient: http.client, credentialStore: store });
    await first.login("Jane.Doe", "test-secret");

    const second = UntisSession.create({ tenant, httpClient: http.client, credentialStore: store });
    expect(await second.restore("Jane.Doe")).toBe(true);
    expect((await second.getUserData()).displayName).toBe("Jane Doe");

    await second.logout();
    expect(second.isAuthenticated).toBe(false);
    expect(http.requests[http.requests.length - 1].rpcMethod).toBe("logout");
    expect(await first.restore("Jane.Doe")).toBe(false);
  });
});

describe("timetable cache modes", () => {
  const cachedWeek: Timetable = {
    displayableStartDate: range.from,
    displayableEndDate: range.to,
    periods: [],
  };

  it("never touches the cache with NO_CACHE", async () => {
    const cache = new RecordingCache(cachedWeek);
    const { session } = await loggedIn({ cache, cacheMode: CacheMode.NO_CACHE });

    await session.getTimetable(range);

    expect(cache.loads).toBe(0);
    expect(cache.stored).toHaveLength(0);
  });

  it("stores but never reads with ONLINE_ONLY", async () => {
    const cache = new RecordingCache(cachedWeek);
    const { session } = await loggedIn({ cache, cacheMode: CacheMode.ONLINE_ONLY });

    const timetable = await session.getTimetable(range);

    expect(cache.loads).toBe(0);
    expect(cache.stored).toEqual([timetable]);
  });

  it("answers from the cache with OFFLINE_ONLY", async () => {
    const cache = new RecordingCache(cachedWeek);
    const { http, session } = await loggedIn({ cache });

    const timetable = await session.getTimetable(range, { cacheMode: CacheMode.OFFLINE_ONLY });

    expect(timetable).toBe(cachedWeek);
    expect(http.requests).toHaveLength(1);
    expect(cache.stored).toHaveLength(0);
  });

  it("reads, then fetches and stores on a miss with FULL_CACHE", async () => {
    const cache = new RecordingCache(null);
    const { session } = await loggedIn({ cache, cacheMode: CacheMode.FULL_CACHE });

    await session.getTimetable(range);

    expect(cache.loads).toBe(1);
    expect(cache.stored).toHaveLength(1);
  });

  it("carries on when the cache fails", async () => {
    const cache = new RecordingCache(null, true);
    const { session } = await loggedIn({ cache, cacheMode: CacheMode.FULL_CACHE });

    const timetable = await session.getTimetable(range);

    expect(timetable.periods).toHaveLength(1);
  });
});

describe("searchSchools", () => {
  it("queries the school directory without a login", async () => {
    const http = createFakeHttp(() =>
      rpcResult({
        schools: [{ schoolId: 77, loginName: "example-school", displayName: "Example School", server: "demo.webuntis.com" }],
      }),
    );

    const schools = await searchSchools("example", {
      httpClient: http.client,
      urls: ["https://search.example.test/schoolquery2"],
    });

    expect(schools.map((school) => school.loginName)).toEqual(["example-school"]);
    expect(http.requests[0].url).toBe("https://search.example.test/schoolquery2");
    expect(http.requests[0].body).toMatchObject({ method: "searchSchools", params: [{ search: "example" }] });
  });

  it("skips the network for a blank query", async () => {
    const http = createFakeHttp(() => rpcResult({ schools: [] }));
    expect(await searchSchools("  ", { httpClient: http.client })).toEqual([]);
    expect(http.requests).toHaveLength(0);
  });
});
