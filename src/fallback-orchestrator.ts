import {
  AllCandidatesExhaustedError,
  AuthFailureError,
  FatalServerError,
  OperationCancelledError,
} from "./errors.js";
import { logger } from "./logger.js";
import {
  CacheMode,
  isJsonRpcDialect,
  type CandidateAttempt,
  type Credentials,
  type EndpointCandidate,
  type OperationInput,
  type ProtocolClient,
} from "./types.js";

export interface ProtocolClients {
  jsonRpc: ProtocolClient;
  rest: ProtocolClient;
}

export interface OrchestratorRequest {
  input: OperationInput;
  credentials: Credentials | null;
  cacheMode?: CacheMode;
}

export interface OrchestratorSuccess {
  payload: unknown;
  /** The candidate that answered; callers may pin it for later calls. */
  candidate: EndpointCandidate;
  attempts: CandidateAttempt[];
}

/**
 * Upper bound for one logical operation. Timeouts apply per network call,
 * so an operation may take up to one timeout for every candidate it tries.
 */
export function worstCaseDurationMs(
  candidateCount: number,
  perCallTimeoutMs: number,
): number {
  return candidateCount * perCallTimeoutMs;
}

/**
 * Drives one logical operation through ranked candidates, one at a time.
 *
 * - success: done, returns the payload and the winning candidate
 * - not-supported / transient-network-error: moves on to the next candidate
 * - auth-failure / fatal-server-error: stops and throws
 *
 * Each candidate is tried at most once per call. Nothing is remembered
 * between calls.
 */
export class FallbackOrchestrator {
  constructor(private readonly clients: ProtocolClients) {}

  async execute(
    operation: string,
    candidates: readonly EndpointCandidate[],
    request: OrchestratorRequest,
    signal?: AbortSignal,
  ): Promise<OrchestratorSuccess> {
    const ordered = [...candidates].sort((a, b) => a.rank - b.rank);
    const attempts: CandidateAttempt[] = [];
    const cacheMode = request.cacheMode ?? CacheMode.ONLINE_ONLY;

    for (const candidate of ordered) {
      if (signal?.aborted) {
        throw new OperationCancelledError(operation);
      }

      const client = isJsonRpcDialect(candidate.dialect)
        ? this.clients.jsonRpc
        : this.clients.rest;
      const params = candidate.buildParams(request.input, request.credentials);

      logger.debug(
        `[FALLBACK] ${operation}: trying #${candidate.rank} ${candidate.dialect} ${candidate.method}`,
      );

      const outcome = await client.execute(
        candidate,
        { params, credentials: request.credentials, cacheMode },
        signal,
      );
      attempts.push({ candidate, outcome });

      switch (outcome.kind) {
        case "success":
          logger.info(
            `[SUCCESS] ${operation} answered by ${candidate.dialect} ${candidate.method}`,
          );
          return { payload: outcome.payload, candidate, attempts };

        case "not-supported":
        case "transient-network-error":
          logger.debug(
            `[FALLBACK] ${operation}: ${candidate.method} -> ${outcome.kind} (${outcome.reason})`,
          );
          continue;

        case "auth-failure":
          logger.warn(`[BLOCKED] ${operation}: authentication rejected (${outcome.reason})`);
          throw new AuthFailureError(operation, outcome.reason, attempts);

        case "fatal-server-error":
          logger.error(`[ERROR] ${operation}: server error ${outcome.message}`);
          throw new FatalServerError(operation, outcome.message, attempts, outcome.code);
      }
    }

    logger.error(`[ERROR] ${operation}: all ${attempts.length} candidates failed`);
    throw new AllCandidatesExhaustedError(operation, attempts);
  }
}
