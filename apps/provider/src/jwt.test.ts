import { describe, it, expect } from "vitest";
import { generateKeyPairSync, verify } from "node:crypto";

import { base64url, mint } from "./jwt.js";
import { CryptoError } from "./errors.js";
import { decodeSegment, testKeys } from "./fakeGitHub.js";

const NOW = 1_700_000_000_000;

// ---------------------------------------------------------------------------
// base64url
// ---------------------------------------------------------------------------

describe("base64url", () => {
  it("produces no +, /, or = characters", () => {
    // Use bytes that would produce all three in standard base64
    const tricky = Buffer.from([0xfb, 0xef, 0xbe, 0xff, 0xfe]);
    expect(base64url(tricky)).toBe("----__4");
  });

  it("accepts both Buffer and string inputs", () => {
    expect(base64url("test")).toBe(base64url(Buffer.from("test", "utf8")));
  });
});

// ---------------------------------------------------------------------------
// mint
// ---------------------------------------------------------------------------

describe("mint", () => {
  const { privateKey, publicKey } = testKeys();

  it("produces three dot-separated parts", () => {
    const parts = mint("12345", privateKey, NOW).token.split(".");
    expect(parts).toHaveLength(3);
    expect(parts.every((p) => p.length > 0)).toBe(true);
  });

  it("header decodes to RS256/JWT", () => {
    const [header] = mint("12345", privateKey, NOW).token.split(".");
    expect(decodeSegment(header)).toEqual({ alg: "RS256", typ: "JWT" });
  });

  it("backdates iat by 60s and expires 540s after now", () => {
    const [, payload] = mint("99999", privateKey, NOW).token.split(".");
    expect(decodeSegment(payload)).toEqual({
      iat: 1_699_999_940,
      exp: 1_700_000_540,
      iss: "99999",
    });
  });

  it("never spans more than ten minutes", () => {
    const jwt = mint("99999", privateKey, NOW + 123);
    expect(jwt.issuedAt).toBe(1_699_999_940_000);
    expect(jwt.expiresAt).toBe(1_700_000_540_000);
    expect(jwt.expiresAt - jwt.issuedAt).toBeLessThanOrEqual(600_000);
  });

  it("signs with the App key", () => {
    const [header, payload, sig] = mint("12345", privateKey, NOW).token.split(".");
    const ok = verify(
      "RSA-SHA256",
      Buffer.from(`${header}.${payload}`, "utf8"),
      publicKey,
      Buffer.from(sig, "base64url"),
    );
    expect(ok).toBe(true);
  });

  it("accepts the key as a Buffer", () => {
    const jwt = mint("12345", Buffer.from(privateKey, "utf8"), NOW);
    expect(jwt.token.split(".")).toHaveLength(3);
  });

  it("fails with CryptoError on an unparseable key", () => {
    expect(() => mint("12345", "not a key", NOW)).toThrow(CryptoError);
    expect(() => mint("12345", "not a key", NOW)).toThrow(
      "GitHub App private key could not be parsed",
    );
  });

  it("rejects non-RSA keys", () => {
    const ec = generateKeyPairSync("ec", {
      namedCurve: "P-256",
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
      publicKeyEncoding: { type: "spki", format: "pem" },
    });
    expect(() => mint("12345", ec.privateKey, NOW)).toThrow(
      "GitHub App private key must be RSA, got ec",
    );
  });
});
