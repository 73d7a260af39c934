import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import {
  ASYNC_PROVIDER_ID,
  SYNC_PROVIDER_ID,
  lookupProvider,
  registerProvider,
  registeredProviders,
  resetProviders,
} from "./registry.js";
import { GitHubAsyncProvider, GitHubProvider } from "./provider.js";
import { ConfigurationError } from "./errors.js";

function stubPatEnv(token: string): void {
  vi.stubEnv("GITHUB_TOKEN", token);
  vi.stubEnv("GITHUB_APP_ID", "");
  vi.stubEnv("GITHUB_APP_PRIVATE_KEY", "");
  vi.stubEnv("GITHUB_APP_INSTALLATION_ID", "");
  vi.stubEnv("GITHUB_GQL_CONFIG", path.join(os.tmpdir(), "ghgql-registry-test-missing.json"));
}

afterEach(() => {
  resetProviders();
  vi.unstubAllEnvs();
});

describe("provider registry", () => {
  it("registers the sync and async identifiers", () => {
    expect(registeredProviders()).toEqual(expect.arrayContaining([SYNC_PROVIDER_ID, ASYNC_PROVIDER_ID]));
  });

  it("constructs lazily and only once", () => {
    const provider = new GitHubProvider({ settings: { personalToken: "test-token" } });
    const factory = vi.fn(() => provider);
    registerProvider("lazy-test", factory);

    expect(factory).not.toHaveBeenCalled();
    expect(lookupProvider("lazy-test")).toBe(provider);
    expect(lookupProvider("lazy-test")).toBe(provider);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("rebuilds after a reset", () => {
    const factory = vi.fn(() => new GitHubProvider({ settings: { personalToken: "test-token" } }));
    registerProvider("reset-test", factory);

    const first = lookupProvider("reset-test");
    resetProviders();
    const second = lookupProvider("reset-test");

    expect(second).not.toBe(first);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("rejects unknown identifiers", () => {
    expect(() => lookupProvider("gitlab")).toThrow(/^Unknown provider "gitlab"\. Registered: /);
    expect(() => lookupProvider("gitlab")).toThrow(ConfigurationError);
  });

  it("builds the blocking provider from the environment", () => {
    stubPatEnv("test-token");
    const provider = lookupProvider(SYNC_PROVIDER_ID);

    expect(provider).toBeInstanceOf(GitHubProvider);
    expect(provider.core.credential).toEqual({ kind: "personal", value: "test-token" });
  });

  it("builds the concurrent provider from the environment", () => {
    stubPatEnv("test-token");
    expect(lookupProvider(ASYNC_PROVIDER_ID)).toBeInstanceOf(GitHubAsyncProvider);
  });

  it("surfaces missing credentials on first lookup", () => {
    stubPatEnv("");
    expect(() => lookupProvider(SYNC_PROVIDER_ID)).toThrow(ConfigurationError);
  });
});
