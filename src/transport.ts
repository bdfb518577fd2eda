import axios, { type AxiosInstance } from "axios";
import { CONFIG, clientHeaders } from "./config.js";
import { OperationCancelledError } from "./errors.js";
import { logger } from "./logger.js";
import { isRecord, pickString } from "./record-utils.js";
import type { EndpointCandidate, ResponseOutcome } from "./types.js";

export interface TransportOptions {
  /** Preconfigured client; tests pass one with an in-process adapter. */
  httpClient?: AxiosInstance;
  timeoutMs?: number;
}

export function createHttpClient(options: TransportOptions): AxiosInstance {
  if (options.httpClient) {
    return options.httpClient;
  }
  return axios.create({
    timeout: options.timeoutMs ?? CONFIG.untis.requestTimeoutMs,
    headers: {
      ...clientHeaders(),
      Accept: "application/json",
    },
    // Status codes are classified by the bindings, not thrown by axios.
    validateStatus: () => true,
  });
}

export function setupLoggingInterceptors(
  httpClient: AxiosInstance,
  label: string,
): void {
  httpClient.interceptors.request.use((config) => {
    logger.debug(`[REQUEST] ${label} request:`, {
      url: config.url,
      method: config.method?.toUpperCase(),
      hasCookie: Boolean(config.headers["Cookie"]),
      hasAuth: Boolean(config.headers["Authorization"]),
    });
    return config;
  });

  httpClient.interceptors.response.use((response) => {
    logger.debug(`[RESPONSE] ${label} response received:`, {
      status: response.status,
      url: response.config.url,
      hasData: response.data !== undefined && response.data !== "",
    });
    return response;
  });
}

export function messageFromBody(body: unknown, status: number): string {
  if (isRecord(body)) {
    const nested = isRecord(body.error) ? pickString(body.error, ["message"]) : undefined;
    const message =
      nested ??
      pickString(body, ["message", "errorMessage", "error_description", "error"]);
    if (message) {
      return message;
    }
  }
  if (typeof body === "string" && body.trim() !== "") {
    return body.trim().slice(0, 200);
  }
  return `HTTP ${status}`;
}

/**
 * Shared HTTP status rules. Returns null for statuses the caller should
 * inspect further (2xx and 3xx).
 */
export function classifyHttpStatus(
  status: number,
  body: unknown,
): ResponseOutcome | null {
  if (status === 401 || status === 403) {
    return {
      kind: "auth-failure",
      reason: messageFromBody(body, status),
      status,
    };
  }
  if (status === 404) {
    return { kind: "not-supported", reason: `HTTP 404: ${messageFromBody(body, status)}` };
  }
  if (status >= 400) {
    return { kind: "fatal-server-error", message: messageFromBody(body, status), status };
  }
  return null;
}

/**
 * Maps a rejected request to a transport outcome. Cancellation is not an
 * outcome: it surfaces as {@link OperationCancelledError}.
 */
export function classifyTransportError(
  error: unknown,
  candidate: EndpointCandidate,
): ResponseOutcome {
  if (axios.isCancel(error)) {
    throw new OperationCancelledError(candidate.method);
  }
  if (!axios.isAxiosError(error)) {
    throw error;
  }

  if (error.response) {
    const classified = classifyHttpStatus(error.response.status, error.response.data);
    if (classified) {
      return classified;
    }
  }

  switch (error.code) {
    case "ECONNREFUSED":
      logger.warn(`[NETWORK] Connection refused by ${candidate.url}`);
      break;
    case "ETIMEDOUT":
    case "ECONNABORTED":
      logger.warn(`[TIMEOUT] Request to ${candidate.url} timed out`);
      break;
    case "ENOTFOUND":
    case "EAI_AGAIN":
      logger.warn(`[NETWORK] DNS lookup failed for ${candidate.url}`);
      break;
    default:
      logger.warn(`[NETWORK] Transport error for ${candidate.url}: ${error.message}`);
  }

  return {
    kind: "transient-network-error",
    reason: error.message,
    code: error.code,
  };
}
