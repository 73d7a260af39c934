import {
  formatTimestamp,
  isFresh,
  type AccessToken,
  type Credential,
  type InstallationToken,
  type StaticToken,
} from "@ghgql/shared";
import type { TokenIssuer } from "./githubApp.js";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_REFRESH_MARGIN_MS = 60_000;

interface CacheEntry {
  current?: InstallationToken;
  /** The one exchange in flight for this installation, if any. */
  pending?: Promise<InstallationToken>;
}

export interface TokenCacheOptions {
  /** Tokens expiring within this window of `now` count as expired. */
  refreshMarginMs?: number;
}

/**
 * Installation token cache, one entry per installation id.
 *
 * Safe to call concurrently: callers that find the token stale while an
 * exchange is already running attach to that exchange instead of starting
 * their own, so each installation has at most one exchange in flight.
 * Tokens are frozen and replaced whole; callers never see a partial update.
 */
export class InstallationTokenCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly refreshMarginMs: number;

  constructor(
    private readonly issuer: TokenIssuer | null,
    options: TokenCacheOptions = {},
  ) {
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    if (!Number.isFinite(this.refreshMarginMs) || this.refreshMarginMs < 0) {
      throw new RangeError(`refreshMarginMs must be >= 0, got ${this.refreshMarginMs}`);
    }
  }

  async tokenFor(credential: Credential, now: number): Promise<AccessToken> {
    if (credential.kind === "personal") {
      const token: StaticToken = { kind: "personal", token: credential.value, expiresAt: Infinity };
      return Object.freeze(token);
    }

    const id = credential.installationId;
    let entry = this.entries.get(id);
    if (!entry) {
      entry = {};
      this.entries.set(id, entry);
    }

    const current = entry.current;
    if (current && isFresh(current.expiresAt, now, this.refreshMarginMs)) {
      return current;
    }

    let pending = entry.pending;
    if (!pending) {
      const target = entry;
      pending = this.refresh(target, id, now).finally(() => {
        target.pending = undefined;
      });
      target.pending = pending;
    }
    return pending;
  }

  /** The cached token for an installation, fresh or not. */
  peek(installationId: string): InstallationToken | undefined {
    return this.entries.get(installationId)?.current;
  }

  /** Drop a cached token, e.g. after GitHub revoked it. */
  invalidate(installationId: string): void {
    const entry = this.entries.get(installationId);
    if (entry) entry.current = undefined;
  }

  private async refresh(entry: CacheEntry, id: string, now: number): Promise<InstallationToken> {
    if (!this.issuer) {
      throw new ConfigurationError(`No token issuer configured for installation ${id}`);
    }
    try {
      console.log(`[token-cache] Exchanging JWT for installation ${id}`);
      const token = await this.issuer.issue(id, now);
      entry.current = token;
      console.log(`[token-cache] Installation ${id} token valid until ${formatTimestamp(token.expiresAt)}`);
      return token;
    } catch (err) {
      console.error(
        `[token-cache] Exchange for installation ${id} failed:`,
        err instanceof Error ? err.message : err,
      );
      throw err;
    }
  }
}
