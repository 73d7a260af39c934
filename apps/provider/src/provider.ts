import type { Octokit } from "octokit";
import {
  ConfigSchema,
  type AccessToken,
  type Config,
  type Credential,
  type GraphQLEnvelope,
  type Operation,
  type SettingsInput,
} from "@ghgql/shared";
import { resolveCredential } from "./auth.js";
import { ConfigurationError } from "./errors.js";
import { makeOctokit, type FetchLike } from "./client.js";
import { GitHubApp, type TokenScope } from "./githubApp.js";
import { InstallationTokenCache } from "./tokenCache.js";
import {
  BlockingDispatcher,
  ConcurrentDispatcher,
  type DispatchOptions,
} from "./dispatcher.js";

export interface TransportOptions {
  config?: Partial<Config>;
  fetch?: FetchLike;
  /** Wall clock in epoch ms. */
  clock?: () => number;
}

export interface ProviderOptions extends TransportOptions {
  settings: SettingsInput;
}

/** A core that skips credential resolution and asks `tokenSource` instead. */
export interface BoundProviderOptions extends TransportOptions {
  tokenSource: (now: number) => Promise<AccessToken>;
}

export interface RepoBindingOptions extends TransportOptions {
  scope?: TokenScope;
}

/**
 * What both facades share: the credential (resolved once), the Octokit
 * transport and the installation token cache.
 */
export class ProviderCore {
  /** `null` when the core is bound to a token source. */
  readonly credential: Credential | null;
  readonly config: Config;
  readonly octokit: Octokit;
  readonly app: GitHubApp | null;
  readonly cache: InstallationTokenCache;
  readonly clock: () => number;
  private readonly source: (now: number) => Promise<AccessToken>;

  constructor(options: ProviderOptions | BoundProviderOptions) {
    const config = ConfigSchema.safeParse(options.config ?? {});
    if (!config.success) {
      throw new ConfigurationError("Invalid provider config", {
        issues: config.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    this.config = config.data;
    this.clock = options.clock ?? Date.now;
    this.octokit = makeOctokit({ config: this.config, fetch: options.fetch });

    if ("tokenSource" in options) {
      this.credential = null;
      this.app = null;
      this.cache = new InstallationTokenCache(null);
      this.source = options.tokenSource;
      return;
    }

    const credential = resolveCredential(options.settings);
    this.credential = credential;
    this.app =
      credential.kind === "app"
        ? GitHubApp.fromCredential(this.octokit, credential, this.clock)
        : null;
    this.cache = new InstallationTokenCache(this.app, {
      refreshMarginMs: this.config.refreshMarginSeconds * 1000,
    });
    this.source = (now) => this.cache.tokenFor(credential, now);
  }

  /** Calls go out as the App itself, with a JWT signed per call. */
  static forApp(app: GitHubApp, options: TransportOptions = {}): ProviderCore {
    return new ProviderCore({ ...options, tokenSource: async (now) => app.appToken(now) });
  }

  /**
   * Calls go out with one installation token for `repository` ("owner/repo").
   * The token is issued here and not refreshed; build a new core once it expires.
   */
  static async forRepo(
    app: GitHubApp,
    repository: string,
    { scope, ...options }: RepoBindingOptions = {},
  ): Promise<ProviderCore> {
    const token = await app.tokenForRepo(repository, undefined, scope);
    return new ProviderCore({ ...options, tokenSource: async () => token });
  }

  /** Token for one call; `now` is read once per call. */
  token(): Promise<AccessToken> {
    return this.source(this.clock());
  }
}

function coreOf(core: ProviderCore | ProviderOptions): ProviderCore {
  return core instanceof ProviderCore ? core : new ProviderCore(core);
}

/** Blocking provider: calls run strictly one after another. */
export class GitHubProvider {
  readonly core: ProviderCore;
  private readonly dispatcher: BlockingDispatcher;

  constructor(core: ProviderCore | ProviderOptions) {
    this.core = coreOf(core);
    this.dispatcher = new BlockingDispatcher(this.core.octokit, this.core.config.previews);
  }

  execute(operation: Operation): Promise<GraphQLEnvelope> {
    return this.dispatcher.dispatch(() => this.core.token(), operation);
  }
}

/** Concurrent provider: calls interleave; each may be cancelled via `signal`. */
export class GitHubAsyncProvider {
  readonly core: ProviderCore;
  private readonly dispatcher: ConcurrentDispatcher;

  constructor(core: ProviderCore | ProviderOptions) {
    this.core = coreOf(core);
    this.dispatcher = new ConcurrentDispatcher(this.core.octokit, this.core.config.previews);
  }

  executeAsync(operation: Operation, options: DispatchOptions = {}): Promise<GraphQLEnvelope> {
    return this.dispatcher.dispatch(() => this.core.token(), operation, options);
  }
}

export type Provider = GitHubProvider | GitHubAsyncProvider;
