import { settingsFromEnv } from "./auth.js";
import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { GitHubAsyncProvider, GitHubProvider, type Provider } from "./provider.js";

export const SYNC_PROVIDER_ID = "github";
export const ASYNC_PROVIDER_ID = "github-async";

export type ProviderFactory = () => Provider;

const factories = new Map<string, ProviderFactory>();
const instances = new Map<string, Provider>();

/** Register (or replace) a factory; any instance already built for `id` is dropped. */
export function registerProvider(id: string, factory: ProviderFactory): void {
  factories.set(id, factory);
  instances.delete(id);
}

/** Build the provider on first lookup, then hand back the same instance. */
export function lookupProvider(id: string): Provider {
  const existing = instances.get(id);
  if (existing) return existing;

  const factory = factories.get(id);
  if (!factory) {
    throw new ConfigurationError(
      `Unknown provider "${id}". Registered: ${[...factories.keys()].join(", ") || "(none)"}`,
      { id },
    );
  }

  console.log(`[registry] Constructing provider "${id}"`);
  const provider = factory();
  instances.set(id, provider);
  return provider;
}

export function registeredProviders(): string[] {
  return [...factories.keys()];
}

/** Forget built instances so the next lookup re-reads configuration. */
export function resetProviders(): void {
  instances.clear();
}

registerProvider(
  SYNC_PROVIDER_ID,
  () => new GitHubProvider({ settings: settingsFromEnv(), config: loadConfig() }),
);
registerProvider(
  ASYNC_PROVIDER_ID,
  () => new GitHubAsyncProvider({ settings: settingsFromEnv(), config: loadConfig() }),
);
