import type { CandidateAttempt } from "./types.js";

export class UntisClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingSchoolError extends UntisClientError {
  constructor() {
    super("School name is required to build WebUntis endpoints");
  }
}

export class NoValidEndpointsError extends UntisClientError {
  constructor(
    readonly host: string,
    readonly failures: string[],
  ) {
    super(
      `No valid endpoints could be built for host "${host}": ${failures.join("; ") || "empty host"}`,
    );
  }
}

export class NotAuthenticatedError extends UntisClientError {
  constructor(operation: string) {
    super(`Operation ${operation} requires a login first`);
  }
}

export class RefreshUnavailableError extends UntisClientError {
  constructor(readonly user: string) {
    super(`Session of ${user} carries no refresh token; log in again`);
  }
}

export class OperationCancelledError extends UntisClientError {
  constructor(readonly operation: string) {
    super(`Operation ${operation} was cancelled`);
  }
}

export class AuthFailureError extends UntisClientError {
  constructor(
    readonly operation: string,
    readonly reason: string,
    readonly attempts: CandidateAttempt[],
  ) {
    super(`Authentication failed during ${operation}: ${reason}`);
  }
}

export class FatalServerError extends UntisClientError {
  constructor(
    readonly operation: string,
    readonly serverMessage: string,
    readonly attempts: CandidateAttempt[],
    readonly code?: number,
  ) {
    super(
      `Server rejected ${operation}${code !== undefined ? ` [${code}]` : ""}: ${serverMessage}`,
    );
  }
}

export class AllCandidatesExhaustedError extends UntisClientError {
  constructor(
    readonly operation: string,
    readonly attempts: CandidateAttempt[],
  ) {
    super(
      attempts.length === 0
        ? `No candidates available for ${operation}`
        : `All ${attempts.length} candidates failed for ${operation}:\n${describeAttempts(attempts)}`,
    );
  }
}

export function describeAttempts(attempts: CandidateAttempt[]): string {
  return attempts
    .map(({ candidate, outcome }) => {
      const detail =
        outcome.kind === "fatal-server-error"
          ? outcome.message
          : outcome.kind === "success"
            ? "ok"
            : outcome.reason;
      return `  #${candidate.rank} ${candidate.dialect} ${candidate.method} -> ${outcome.kind} (${detail})`;
    })
    .join("\n");
}
