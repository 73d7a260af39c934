import { RequestError, type Octokit } from "octokit";
import {
  InstallationTokenResponseSchema,
  parseTimestamp,
  type AppInstallation,
  type AppToken,
  type InstallationToken,
} from "@ghgql/shared";
import { mint } from "./jwt.js";
import { AuthError } from "./errors.js";

type CreateTokenParams = NonNullable<
  Parameters<Octokit["rest"]["apps"]["createInstallationAccessToken"]>[0]
>;
export type InstallationPermissions = NonNullable<CreateTokenParams["permissions"]>;

export interface TokenScope {
  repositoryIds?: number[];
  permissions?: InstallationPermissions;
}

const API_HEADERS = {
  accept: "application/vnd.github+json",
  "x-github-api-version": "2022-11-28",
} as const;

async function asAuthError<T>(endpoint: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof RequestError) {
      throw new AuthError(`${endpoint} failed: ${err.status}`, {
        endpoint,
        status: err.status,
        body: err.response?.data,
        cause: err,
      });
    }
    throw err;
  }
}

/** Anything that can trade an installation id for an installation token. */
export interface TokenIssuer {
  issue(installationId: string, now: number): Promise<InstallationToken>;
}

/**
 * App-authenticated slice of the GitHub REST API.
 *
 * Each call signs a fresh JWT, so an instance can be held for the life of
 * the process.
 */
export class GitHubApp implements TokenIssuer {
  constructor(
    private readonly octokit: Octokit,
    readonly appId: string,
    private readonly privateKey: string | Buffer,
    private readonly clock: () => number = Date.now,
  ) {}

  static fromCredential(
    octokit: Octokit,
    credential: AppInstallation,
    clock?: () => number,
  ): GitHubApp {
    return new GitHubApp(octokit, credential.appId, credential.privateKey, clock);
  }

  /** A freshly signed App JWT, usable as a GraphQL or REST credential. */
  appToken(now: number = this.clock()): AppToken {
    const jwt = mint(this.appId, this.privateKey, now);
    const token: AppToken = { kind: "app", token: jwt.token, expiresAt: jwt.expiresAt };
    return Object.freeze(token);
  }

  private headers(now: number = this.clock()) {
    return {
      ...API_HEADERS,
      authorization: `Bearer ${this.appToken(now).token}`,
    };
  }

  /** GET /app */
  async getThisApp() {
    const res = await asAuthError("GET /app", () =>
      this.octokit.rest.apps.getAuthenticated({ headers: this.headers() }),
    );
    return res.data;
  }

  /** GET /apps/{app_slug} */
  async getApp(slug: string) {
    const res = await asAuthError(`GET /apps/${slug}`, () =>
      this.octokit.rest.apps.getBySlug({ app_slug: slug, headers: this.headers() }),
    );
    return res.data;
  }

  /** GET /app/installations, following every page. */
  async listInstallations() {
    return asAuthError("GET /app/installations", () =>
      this.octokit.paginate(this.octokit.rest.apps.listInstallations, {
        per_page: 100,
        headers: this.headers(),
      }),
    );
  }

  async getInstallation(installationId: string | number) {
    const res = await asAuthError(`GET /app/installations/${installationId}`, () =>
      this.octokit.rest.apps.getInstallation({
        installation_id: Number(installationId),
        headers: this.headers(),
      }),
    );
    return res.data;
  }

  /** Uninstalls the App from the account. GitHub answers 204. */
  async deleteInstallation(installationId: string | number): Promise<void> {
    await asAuthError(`DELETE /app/installations/${installationId}`, () =>
      this.octokit.rest.apps.deleteInstallation({
        installation_id: Number(installationId),
        headers: this.headers(),
      }),
    );
    console.log(`[app] Deleted installation ${installationId}`);
  }

  async getOrgInstallation(org: string) {
    const res = await asAuthError(`GET /orgs/${org}/installation`, () =>
      this.octokit.rest.apps.getOrgInstallation({ org, headers: this.headers() }),
    );
    return res.data;
  }

  async getRepoInstallation(owner: string, repo: string) {
    const res = await asAuthError(`GET /repos/${owner}/${repo}/installation`, () =>
      this.octokit.rest.apps.getRepoInstallation({ owner, repo, headers: this.headers() }),
    );
    return res.data;
  }

  async getUserInstallation(username: string) {
    const res = await asAuthError(`GET /users/${username}/installation`, () =>
      this.octokit.rest.apps.getUserInstallation({ username, headers: this.headers() }),
    );
    return res.data;
  }

  /**
   * POST /app/installations/{installation_id}/access_tokens
   *
   * `scope` narrows the token to specific repositories or permissions.
   */
  async createInstallationToken(
    installationId: string | number,
    scope: TokenScope = {},
    now: number = this.clock(),
  ): Promise<InstallationToken> {
    const endpoint = `POST /app/installations/${installationId}/access_tokens`;
    const res = await asAuthError(endpoint, () =>
      this.octokit.rest.apps.createInstallationAccessToken({
        installation_id: Number(installationId),
        ...(scope.repositoryIds ? { repository_ids: scope.repositoryIds } : {}),
        ...(scope.permissions ? { permissions: scope.permissions } : {}),
        headers: this.headers(now),
      }),
    );

    const parsed = InstallationTokenResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new AuthError(`${endpoint} returned a malformed token response`, {
        endpoint,
        status: res.status,
        body: res.data,
      });
    }

    const token: InstallationToken = {
      kind: "installation",
      token: parsed.data.token,
      expiresAt: parseTimestamp(parsed.data.expires_at),
      installationId: String(installationId),
    };
    return Object.freeze(token);
  }

  issue(installationId: string, now: number): Promise<InstallationToken> {
    return this.createInstallationToken(installationId, {}, now);
  }

  /**
   * tokenForRepo("owner/repo") or tokenForRepo("owner", "repo").
   *
   * Looks up the repository's installation and issues a token for it,
   * optionally scoped.
   */
  async tokenForRepo(
    ownerOrRepo: string,
    repo?: string,
    scope: TokenScope = {},
  ): Promise<InstallationToken> {
    let owner = ownerOrRepo;
    if (repo === undefined) {
      const slash = ownerOrRepo.indexOf("/");
      if (slash <= 0 || slash === ownerOrRepo.length - 1) {
        throw new TypeError(`Expected "owner/repo", got "${ownerOrRepo}"`);
      }
      owner = ownerOrRepo.slice(0, slash);
      repo = ownerOrRepo.slice(slash + 1);
    }

    const inst = await this.getRepoInstallation(owner, repo);
    console.log(`[app] ${owner}/${repo} is served by installation ${inst.id}`);
    return this.createInstallationToken(inst.id, scope);
  }
}

/**
 * POST /app-manifests/{code}/conversions
 *
 * Finishes the App manifest flow. The `code` is the credential here, so no
 * JWT is sent. The result carries the new App's private key and secrets.
 */
export async function createAppFromManifest(octokit: Octokit, code: string) {
  const res = await asAuthError("POST /app-manifests/{code}/conversions", () =>
    octokit.rest.apps.createFromManifest({ code, headers: API_HEADERS }),
  );
  console.log("[app] Converted App manifest");
  return res.data;
}

/**
 * Issue one installation token per account login.
 * Fails if any owner has not installed the App.
 */
export async function mintTokensForOwners(
  app: GitHubApp,
  owners: string[],
): Promise<Record<string, string>> {
  const installations = await app.listInstallations();

  const byLogin = new Map<string, number>();
  for (const inst of installations) {
    const account = inst.account;
    if (account && "login" in account) {
      byLogin.set(account.login, inst.id);
    }
  }

  const tokensByOwner: Record<string, string> = {};
  for (const owner of owners) {
    const id = byLogin.get(owner);
    if (id === undefined) {
      throw new Error(`No installation found for owner "${owner}". Did you install the app there?`);
    }
    const token = await app.createInstallationToken(id);
    tokensByOwner[owner] = token.token;
  }
  return tokensByOwner;
}
