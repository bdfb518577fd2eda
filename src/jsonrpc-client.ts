import { randomUUID } from "crypto";
import type { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import { logger } from "./logger.js";
import { isRecord } from "./record-utils.js";
import {
  classifyHttpStatus,
  classifyTransportError,
  createHttpClient,
  setupLoggingInterceptors,
  type TransportOptions,
} from "./transport.js";
import type {
  DispatchRequest,
  EndpointCandidate,
  ProtocolClient,
  ResponseOutcome,
} from "./types.js";

export const JSON_RPC_VERSION = "2.0";
export const METHOD_NOT_FOUND = -32601;

/** Server codes for rejected or expired credentials. */
export const AUTH_ERROR_CODES: ReadonlySet<number> = new Set([-8504, -8520]);

export interface JsonRpcRequest {
  id: string;
  method: string;
  params: [Record<string, unknown>];
  jsonrpc: typeof JSON_RPC_VERSION;
}

const envelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.string(), z.number()]).nullish(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string().default(""),
      data: z.unknown().optional(),
    })
    .nullish(),
});

export function createJsonRpcRequest(
  method: string,
  params: Record<string, unknown>,
): JsonRpcRequest {
  return {
    id: randomUUID(),
    method,
    params: [params],
    jsonrpc: JSON_RPC_VERSION,
  };
}

/** Classifies a decoded response body. `result` and `error` are mutually exclusive. */
export function classifyEnvelope(body: unknown): ResponseOutcome {
  if (!isRecord(body)) {
    return {
      kind: "fatal-server-error",
      message: "Malformed JSON-RPC envelope: body is not an object",
    };
  }

  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    return {
      kind: "fatal-server-error",
      message: `Malformed JSON-RPC envelope: ${parsed.error.issues[0]?.message ?? "invalid shape"}`,
    };
  }

  const { error } = parsed.data;
  if (error) {
    if (error.code === METHOD_NOT_FOUND) {
      return {
        kind: "not-supported",
        reason: `[${error.code}] ${error.message || "Method not found"}`,
      };
    }
    if (AUTH_ERROR_CODES.has(error.code)) {
      return { kind: "auth-failure", reason: `[${error.code}] ${error.message}` };
    }
    return { kind: "fatal-server-error", message: error.message, code: error.code };
  }

  if ("result" in body) {
    return { kind: "success", payload: body.result };
  }

  return {
    kind: "fatal-server-error",
    message: "Malformed JSON-RPC envelope: neither result nor error present",
  };
}

/**
 * JSON-RPC binding: one POST per call, the method name in the envelope and
 * the session carried as a JSESSIONID cookie. Never retries.
 */
export class JsonRpcClient implements ProtocolClient {
  private httpClient: AxiosInstance;

  constructor(options: TransportOptions = {}) {
    this.httpClient = createHttpClient(options);
    setupLoggingInterceptors(this.httpClient, "JSON-RPC");
  }

  async execute(
    candidate: EndpointCandidate,
    request: DispatchRequest,
    signal?: AbortSignal,
  ): Promise<ResponseOutcome> {
    const envelope = createJsonRpcRequest(candidate.method, request.params);
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    const sessionId = request.credentials?.sessionId;
    if (sessionId) {
      headers["Cookie"] = `JSESSIONID=${sessionId}`;
    }

    logger.debug(`[REQUEST] JSON-RPC call: ${candidate.method} (${envelope.id})`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.httpClient.post<unknown>(candidate.url, envelope, {
        headers,
        signal,
      });
    } catch (error) {
      return classifyTransportError(error, candidate);
    }

    const outcome =
      classifyHttpStatus(response.status, response.data) ??
      classifyEnvelope(response.data);

    logger.debug(`[RESPONSE] JSON-RPC ${candidate.method} -> ${outcome.kind}`);
    return outcome;
  }
}
