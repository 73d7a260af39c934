export * from "./errors.js";
export { settingsFromEnv, resolveCredential, unescapePem } from "./auth.js";
export { loadConfig, configPath, CONFIG_FILE_NAME } from "./config.js";
export { mint, base64url, CLOCK_SKEW_SECONDS, JWT_TTL_SECONDS } from "./jwt.js";
export { makeOctokit, type FetchLike, type ClientOptions } from "./client.js";
export {
  GitHubApp,
  createAppFromManifest,
  mintTokensForOwners,
  type TokenIssuer,
  type TokenScope,
  type InstallationPermissions,
} from "./githubApp.js";
export {
  InstallationTokenCache,
  DEFAULT_REFRESH_MARGIN_MS,
  type TokenCacheOptions,
} from "./tokenCache.js";
export {
  GraphQLDispatcher,
  BlockingDispatcher,
  ConcurrentDispatcher,
  type DispatchOptions,
  type TokenSource,
} from "./dispatcher.js";
export {
  ProviderCore,
  GitHubProvider,
  GitHubAsyncProvider,
  type Provider,
  type ProviderOptions,
  type BoundProviderOptions,
  type RepoBindingOptions,
  type TransportOptions,
} from "./provider.js";
export {
  registerProvider,
  lookupProvider,
  registeredProviders,
  resetProviders,
  SYNC_PROVIDER_ID,
  ASYNC_PROVIDER_ID,
  type ProviderFactory,
} from "./registry.js";
