import { Octokit } from "octokit";
import type { Config } from "@ghgql/shared";

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface ClientOptions {
  config: Config;
  /** Transport override; timeouts and proxies live here, not in the provider. */
  fetch?: FetchLike;
}

/**
 * Shared Octokit factory.
 *
 * No `auth` strategy: every request carries its own Authorization header so
 * the scheme stays exactly `token` or `Bearer`. Retry and throttling are off;
 * back-off is left to the host.
 */
export function makeOctokit({ config, fetch }: ClientOptions): Octokit {
  return new Octokit({
    baseUrl: config.baseUrl.replace(/\/+$/, ""),
    userAgent: config.userAgent,
    request: fetch ? { fetch } : {},
    retry: { enabled: false },
    // The handlers are required by the option type but never run while disabled.
    throttle: {
      enabled: false,
      onRateLimit: () => false,
      onSecondaryRateLimit: () => false,
    },
  });
}

/** `Accept` header for the configured API previews, if any. */
export function previewAccept(previews: readonly string[]): string | undefined {
  if (previews.length === 0) return undefined;
  return previews.map((p) => `application/vnd.github.${p}+json`).join(", ");
}
