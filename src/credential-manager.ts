import { createHash } from "crypto";
import { logger } from "./logger.js";
import type { Credentials } from "./types.js";

/**
 * Where sessions live between calls. Keys are the tenant-user identifiers
 * produced by `makeTokenIdentifier`.
 */
export interface CredentialStore {
  save(tenantUserId: string, credentials: Credentials): Promise<boolean>;
  load(tenantUserId: string): Promise<Credentials | null>;
  delete(tenantUserId: string): Promise<boolean>;
}

interface StoredCredentials {
  credentials: Credentials;
  timestamp: number;
}

export const DEFAULT_SESSION_TIMEOUT_MS = 2 * 60 * 60 * 1000; // 2 hours

export class InMemoryCredentialStore implements CredentialStore {
  private credentialStore: Map<string, StoredCredentials> = new Map();

  constructor(
    private readonly sessionTimeoutMs: number = DEFAULT_SESSION_TIMEOUT_MS,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * One-way hash, so identifiers never sit in memory in clear text
   */
  private hashKey(tenantUserId: string): string {
    return createHash("sha256").update(tenantUserId).digest("hex");
  }

  private isExpired(stored: StoredCredentials): boolean {
    return this.now() - stored.timestamp > this.sessionTimeoutMs;
  }

  async save(tenantUserId: string, credentials: Credentials): Promise<boolean> {
    this.credentialStore.set(this.hashKey(tenantUserId), {
      credentials,
      timestamp: this.now(),
    });
    logger.info(`[INFO] Session stored for user: ${credentials.user}`);
    return true;
  }

  async load(tenantUserId: string): Promise<Credentials | null> {
    const hash = this.hashKey(tenantUserId);
    const stored = this.credentialStore.get(hash);

    if (!stored) {
      return null;
    }

    if (this.isExpired(stored)) {
      this.credentialStore.delete(hash);
      logger.debug(`[DEBUG] Session expired for user: ${stored.credentials.user}`);
      return null;
    }

    return stored.credentials;
  }

  async delete(tenantUserId: string): Promise<boolean> {
    const removed = this.credentialStore.delete(this.hashKey(tenantUserId));
    if (removed) {
      logger.info("[INFO] Session invalidated");
    }
    return removed;
  }

  /**
   * Clean up expired sessions
   */
  cleanupExpiredSessions(): number {
    let cleanedCount = 0;

    for (const [hash, stored] of this.credentialStore.entries()) {
      if (this.isExpired(stored)) {
        this.credentialStore.delete(hash);
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      logger.info(`[INFO] Cleaned up ${cleanedCount} expired sessions`);
    }
    return cleanedCount;
  }

  getSessionStats(): { total: number; expired: number } {
    let expired = 0;

    for (const stored of this.credentialStore.values()) {
      if (this.isExpired(stored)) {
        expired++;
      }
    }

    return {
      total: this.credentialStore.size,
      expired,
    };
  }
}
