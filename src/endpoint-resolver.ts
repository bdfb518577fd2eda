import { MissingSchoolError, NoValidEndpointsError } from "./errors.js";
import { logger } from "./logger.js";
import type { OperationDescriptor } from "./operations.js";
import {
  isJsonRpcDialect,
  type Dialect,
  type Endpoint,
  type EndpointCandidate,
  type Tenant,
} from "./types.js";

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const WEBUNTIS_SEGMENT = /\/webuntis(?=\/|$)/i;
const BASE_PATH = "/WebUntis";

/**
 * Canonical base URL for a user-typed host: scheme added when missing,
 * query/fragment/path parameters dropped, and the path cut back to (or
 * extended with) the `/WebUntis` segment. Idempotent.
 */
export function normalizeHost(raw: string): string {
  let value = raw.trim().split("#")[0].split("?")[0].split(";")[0];
  if (value === "") {
    return "";
  }

  if (!SCHEME_PATTERN.test(value)) {
    value = `https://${value}`;
  }

  const schemeEnd = value.indexOf("://") + 3;
  const pathStart = value.indexOf("/", schemeEnd);
  const origin = pathStart === -1 ? value : value.slice(0, pathStart);
  let path = pathStart === -1 ? "" : value.slice(pathStart);

  const segment = WEBUNTIS_SEGMENT.exec(path);
  if (segment) {
    path = path.slice(0, segment.index) + BASE_PATH;
  } else {
    path = path.replace(/\/+$/, "") + BASE_PATH;
  }

  return origin.replace(/\/+$/, "") + path;
}

/**
 * Stable key for one user of one school on one server, handed to the
 * credential store and the timetable cache.
 */
export function makeTokenIdentifier(
  baseUrl: string,
  schoolName: string,
  userIdentifier: string,
): string {
  const host = baseUrl.replace(SCHEME_PATTERN, "").replace(/\/+$/, "");
  return [host, schoolName, userIdentifier]
    .map((part) =>
      part
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9-]+/g, "_"),
    )
    .join("_");
}

function jsonRpcUrl(base: string, path: string, school: string): string {
  const url = new URL(`${base}/${path}`);
  url.searchParams.set("school", school);
  return url.toString();
}

function restUrl(base: string): string {
  return `${new URL(base).origin}${BASE_PATH}`;
}

/**
 * Ordered endpoints for a tenant. Each one is built on its own, so a
 * failure to construct one never prevents the others.
 */
export function resolveEndpoints(tenant: Tenant): readonly Endpoint[] {
  const school = tenant.school.trim();
  if (school === "") {
    throw new MissingSchoolError();
  }

  const base = normalizeHost(tenant.host);
  if (base === "") {
    throw new NoValidEndpointsError(tenant.host, []);
  }

  const builders: ReadonlyArray<readonly [Dialect, () => string]> = [
    ["json-rpc-public", () => jsonRpcUrl(base, "jsonrpc.do", school)],
    ["json-rpc-internal", () => jsonRpcUrl(base, "jsonrpc_intern.do", school)],
    ["rest-v1", () => restUrl(base)],
    ["rest-v3", () => restUrl(base)],
  ];

  const endpoints: Endpoint[] = [];
  const failures: string[] = [];

  for (const [dialect, build] of builders) {
    try {
      endpoints.push(Object.freeze({ dialect, url: build(), school }));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      failures.push(`${dialect}: ${message}`);
      logger.warn(`[WARNING] Could not build ${dialect} endpoint for ${base}:`, message);
    }
  }

  if (endpoints.length === 0) {
    throw new NoValidEndpointsError(tenant.host, failures);
  }

  return Object.freeze(endpoints);
}

/** Fixed endpoints of the school directory, which needs no tenant. */
export function schoolSearchEndpoints(urls: readonly string[]): readonly Endpoint[] {
  return Object.freeze(
    urls.map((url) =>
      Object.freeze({ dialect: "json-rpc-public" as const, url, school: "" }),
    ),
  );
}

/**
 * Expands the operation's variants, in table order, over the endpoints of
 * each variant's dialect. REST variants of authenticated operations need a
 * bearer token and are left out without one.
 */
export function buildCandidates(
  endpoints: readonly Endpoint[],
  descriptor: OperationDescriptor,
  options: { hasBearerToken: boolean },
): EndpointCandidate[] {
  const candidates: EndpointCandidate[] = [];

  for (const variant of descriptor.variants) {
    const rest = !isJsonRpcDialect(variant.dialect);
    if (rest && descriptor.requiresAuth && !options.hasBearerToken) {
      continue;
    }

    for (const endpoint of endpoints) {
      if (endpoint.dialect !== variant.dialect) {
        continue;
      }
      const path = variant.method.replace(
        "{school}",
        encodeURIComponent(endpoint.school),
      );
      candidates.push(
        Object.freeze({
          dialect: variant.dialect,
          url: rest ? `${endpoint.url}${path}` : endpoint.url,
          method: rest ? path : variant.method,
          rank: candidates.length,
          httpMethod: variant.httpMethod,
          buildParams: variant.params,
        }),
      );
    }
  }

  return candidates;
}

export interface SchoolLink {
  tenant: Tenant;
  user: string | null;
}

/** Reads host and school from a WebUntis page URL such as `…/WebUntis/?school=abc#/basic/login`. */
export function parseSchoolUrl(raw: string): Tenant | null {
  const value = raw.trim();
  if (value === "") {
    return null;
  }

  let url: URL;
  try {
    url = new URL(SCHEME_PATTERN.test(value) ? value : `https://${value}`);
  } catch (error) {
    logger.debug(
      "[DEBUG] Not a school URL:",
      error instanceof Error ? error.message : "Unknown error",
    );
    return null;
  }

  let school = url.searchParams.get("school");
  if (!school && url.hash.includes("?")) {
    school = new URLSearchParams(url.hash.slice(url.hash.indexOf("?") + 1)).get(
      "school",
    );
  }
  if (!school || school.trim() === "") {
    return null;
  }

  return Object.freeze({ host: normalizeHost(value), school: school.trim() });
}

/** Reads an `untis://setschool?url=…&school=…&user=…` setup link. */
export function parseSetupCode(code: string): SchoolLink | null {
  let url: URL;
  try {
    url = new URL(code.trim());
  } catch (error) {
    logger.debug(
      "[DEBUG] Not a setup link:",
      error instanceof Error ? error.message : "Unknown error",
    );
    return null;
  }

  if (url.protocol !== "untis:" || url.hostname !== "setschool") {
    return null;
  }

  const host = url.searchParams.get("url");
  const school = url.searchParams.get("school");
  if (!host || !school) {
    return null;
  }

  return {
    tenant: Object.freeze({ host: normalizeHost(host), school }),
    user: url.searchParams.get("user"),
  };
}
