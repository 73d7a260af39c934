/**
 * Credential kinds the provider understands.
 *
 * A personal access token is sent as-is; an App installation is exchanged
 * for a short-lived installation token before any GraphQL call.
 */
export type Credential = PersonalToken | AppInstallation;

export interface PersonalToken {
  readonly kind: "personal";
  readonly value: string;
}

export interface AppInstallation {
  readonly kind: "app";
  readonly appId: string;
  /** PEM-encoded RSA private key. */
  readonly privateKey: string;
  readonly installationId: string;
}

/** Times are epoch milliseconds. */
export interface SignedJWT {
  readonly token: string;
  readonly issuedAt: number;
  readonly expiresAt: number;
}

export interface InstallationToken {
  readonly kind: "installation";
  readonly token: string;
  readonly expiresAt: number;
  readonly installationId: string;
}

/** Wrapper around a personal token so both kinds flow through one path. */
export interface StaticToken {
  readonly kind: "personal";
  readonly token: string;
  readonly expiresAt: number;
}

/** The App's own JWT, for calls made as the App rather than an installation. */
export interface AppToken {
  readonly kind: "app";
  readonly token: string;
  readonly expiresAt: number;
}

export type AccessToken = InstallationToken | StaticToken | AppToken;

/** `Authorization` scheme GitHub expects for each token kind. */
export function authorizationScheme(token: AccessToken): "token" | "Bearer" {
  return token.kind === "personal" ? "token" : "Bearer";
}

export function authorizationHeader(token: AccessToken): string {
  return `${authorizationScheme(token)} ${token.token}`;
}
