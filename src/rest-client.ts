import type { AxiosInstance, AxiosResponse } from "axios";
import { logger } from "./logger.js";
import { isRecord, pickString } from "./record-utils.js";
import {
  classifyHttpStatus,
  classifyTransportError,
  createHttpClient,
  setupLoggingInterceptors,
  type TransportOptions,
} from "./transport.js";
import {
  cacheControlFor,
  type DispatchRequest,
  type EndpointCandidate,
  type ProtocolClient,
  type ResponseOutcome,
} from "./types.js";

const UNKNOWN_RESOURCE_CODES = new Set([
  "NOT_FOUND",
  "UNKNOWN_RESOURCE",
  "RESOURCE_NOT_FOUND",
]);

const UNKNOWN_RESOURCE_MESSAGE = /unknown resource|no static resource|resource not found/i;

/** True when the body says the path does not exist on this server version. */
export function isUnknownResourceBody(body: unknown): boolean {
  if (!isRecord(body)) {
    return false;
  }
  const code = pickString(body, ["errorCode", "code"]);
  if (code && UNKNOWN_RESOURCE_CODES.has(code.toUpperCase())) {
    return true;
  }
  const message = pickString(body, ["message", "errorMessage", "error"]);
  return message !== undefined && UNKNOWN_RESOURCE_MESSAGE.test(message);
}

export function buildRestHeaders(request: DispatchRequest): Record<string, string> {
  const headers: Record<string, string> = {
    "Cache-Mode": request.cacheMode,
    "Cache-Control": cacheControlFor(request.cacheMode),
  };
  const token = request.credentials?.bearerToken;
  if (token) {
    headers["Authorization"] = `Bearer ${token}`;
  }
  return headers;
}

/**
 * REST binding: resource paths, bearer token and cache-mode headers.
 * Never retries.
 */
export class RestClient implements ProtocolClient {
  private httpClient: AxiosInstance;

  constructor(options: TransportOptions = {}) {
    this.httpClient = createHttpClient(options);
    setupLoggingInterceptors(this.httpClient, "REST");
  }

  async execute(
    candidate: EndpointCandidate,
    request: DispatchRequest,
    signal?: AbortSignal,
  ): Promise<ResponseOutcome> {
    const headers = buildRestHeaders(request);

    logger.debug(`[REQUEST] REST ${candidate.httpMethod} ${candidate.method}`);

    let response: AxiosResponse<unknown>;
    try {
      response =
        candidate.httpMethod === "GET"
          ? await this.httpClient.get<unknown>(candidate.url, {
              headers,
              params: request.params,
              paramsSerializer: { indexes: null },
              signal,
            })
          : await this.httpClient.post<unknown>(candidate.url, request.params, {
              headers: { ...headers, "Content-Type": "application/json" },
              signal,
            });
    } catch (error) {
      return classifyTransportError(error, candidate);
    }

    const outcome = this.classify(response);
    logger.debug(`[RESPONSE] REST ${candidate.method} -> ${outcome.kind}`);
    return outcome;
  }

  private classify(response: AxiosResponse<unknown>): ResponseOutcome {
    const { status, data } = response;

    if (status !== 401 && status !== 403 && isUnknownResourceBody(data)) {
      return {
        kind: "not-supported",
        reason: `Unknown resource (HTTP ${status})`,
      };
    }

    return classifyHttpStatus(status, data) ?? { kind: "success", payload: data };
  }
}
