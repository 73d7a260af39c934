import { createPrivateKey, sign as cryptoSign, type KeyObject } from "node:crypto";
import { toEpochSeconds, type SignedJWT } from "@ghgql/shared";
import { CryptoError } from "./errors.js";

/** Backdate `iat` to absorb clock drift between us and GitHub. */
export const CLOCK_SKEW_SECONDS = 60;
/** Keeps exp - iat at exactly the 10 minute ceiling GitHub accepts. */
export const JWT_TTL_SECONDS = 540;

export function base64url(input: Buffer | string): string {
  const buf = typeof input === "string" ? Buffer.from(input, "utf8") : input;
  return buf
    .toString("base64")
    .replace(/=/g, "")
    .replace(/\+/g, "-")
    .replace(/\//g, "_");
}

function loadKey(privateKeyPem: string | Buffer): KeyObject {
  let key: KeyObject;
  try {
    key = createPrivateKey(privateKeyPem);
  } catch (err) {
    throw new CryptoError("GitHub App private key could not be parsed", err);
  }
  if (key.asymmetricKeyType !== "rsa") {
    throw new CryptoError(
      `GitHub App private key must be RSA, got ${key.asymmetricKeyType ?? "unknown"}`,
    );
  }
  return key;
}

/**
 * Build an RS256 JWT asserting the App identity. `now` is epoch ms.
 * A fresh JWT is minted for every use; nothing is cached here.
 */
export function mint(appId: string, privateKeyPem: string | Buffer, now: number): SignedJWT {
  const key = loadKey(privateKeyPem);
  const nowSec = toEpochSeconds(now);
  const iat = nowSec - CLOCK_SKEW_SECONDS;
  const exp = nowSec + JWT_TTL_SECONDS;

  const header = { alg: "RS256", typ: "JWT" };
  const payload = { iat, exp, iss: appId };

  const headerPart = base64url(JSON.stringify(header));
  const payloadPart = base64url(JSON.stringify(payload));
  const signingInput = `${headerPart}.${payloadPart}`;

  const sig = cryptoSign("RSA-SHA256", Buffer.from(signingInput, "utf8"), key);

  return {
    token: `${signingInput}.${base64url(sig)}`,
    issuedAt: iat * 1000,
    expiresAt: exp * 1000,
  };
}
