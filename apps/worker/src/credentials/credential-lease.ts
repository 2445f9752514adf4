/**
 * Credential Lease
 *
 * Owns the one live access credential of the process:
 * - Serves it while it is valid beyond the refresh skew
 * - Single-flight refresh: concurrent callers share one in-flight exchange
 * - Double-check after taking the refresh slot, so late arrivals reuse a
 *   credential that a just-finished refresh produced
 * - Falls back to the previous credential while it is still unexpired
 */

import { log } from "../logger.js";
import { credentialRefreshesTotal } from "../metrics.js";
import { errorMessage, InvalidCredentialResponseError } from "../errors.js";
import type { Credential } from "../types/index.js";
import type { CredentialSource } from "./token-client.js";

export interface CredentialLeaseConfig {
  /** Renew this long before the real expiry */
  refreshSkewMs: number;
  /** Background pre-refresh interval, 0 disables the timer */
  refreshCheckIntervalMs: number;
}

export interface CredentialLeaseStatus {
  hasCredential: boolean;
  expiresAt: number | null;
  refreshes: number;
  refreshInFlight: boolean;
}

export class CredentialLease {
  private current: Credential | null = null;
  private refreshing: Promise<Credential> | null = null;
  private refreshes = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly source: CredentialSource,
    private readonly config: CredentialLeaseConfig,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Get a valid credential, refreshing if necessary.
   *
   * @throws {CredentialError} when no usable credential can be produced
   */
  async acquire(): Promise<Credential> {
    const held = this.current;
    if (held && this.isFresh(held)) {
      return held;
    }

    // Join the refresh already in flight
    if (this.refreshing) {
      return this.refreshing;
    }

    this.refreshing = this.refresh();
    try {
      return await this.refreshing;
    } finally {
      this.refreshing = null;
    }
  }

  /**
   * Drop the held credential so the next acquire() refreshes.
   */
  invalidate(): void {
    if (this.current) {
      log.credential.warn({ expiresAt: this.current.expiresAt }, "credential invalidated");
    }
    this.current = null;
  }

  /**
   * Start the background pre-refresh timer.
   */
  start(): void {
    if (this.timer || this.config.refreshCheckIntervalMs <= 0) return;

    this.timer = setInterval(() => {
      this.acquire().catch((error: unknown) => {
        log.credential.error({ error: errorMessage(error) }, "background refresh failed");
      });
    }, this.config.refreshCheckIntervalMs);
    this.timer.unref();

    log.credential.info({ intervalMs: this.config.refreshCheckIntervalMs }, "pre-refresh started");
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  status(): CredentialLeaseStatus {
    return {
      hasCredential: this.current !== null,
      expiresAt: this.current?.expiresAt ?? null,
      refreshes: this.refreshes,
      refreshInFlight: this.refreshing !== null,
    };
  }

  private isFresh(credential: Credential): boolean {
    return this.now() + this.config.refreshSkewMs < credential.expiresAt;
  }

  private isUnexpired(credential: Credential): boolean {
    return credential.expiresAt > this.now();
  }

  private async refresh(): Promise<Credential> {
    // Double-check: another refresh may have completed since the fast path
    const held = this.current;
    if (held && this.isFresh(held)) {
      return held;
    }

    try {
      const fresh = await this.source.fetchCredential();
      if (!this.isUnexpired(fresh)) {
        throw new InvalidCredentialResponseError("credential is already expired");
      }
      this.current = fresh;
      this.refreshes++;
      credentialRefreshesTotal.inc({ result: "success" });
      log.credential.info({ expiresAt: fresh.expiresAt }, "credential refreshed");
      return fresh;
    } catch (error) {
      credentialRefreshesTotal.inc({ result: "failure" });

      const previous = this.current;
      if (previous && this.isUnexpired(previous)) {
        log.credential.warn(
          { error: errorMessage(error), expiresAt: previous.expiresAt },
          "refresh failed, keeping previous credential"
        );
        return previous;
      }

      log.credential.error({ error: errorMessage(error) }, "refresh failed");
      throw error;
    }
  }
}
