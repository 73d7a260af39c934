import { generateKeyPairSync } from "node:crypto";
import type { FetchLike } from "./client.js";

// In-process stand-in for api.github.com, used by the tests.

export interface RecordedRequest {
  method: string;
  url: URL;
  /** `METHOD /path`, without the query string. */
  route: string;
  headers: Headers;
  body: unknown;
}

export interface FakeReply {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export type FakeHandler = (req: RecordedRequest) => FakeReply | Promise<FakeReply>;

export interface FakeGitHub {
  fetch: FetchLike;
  requests: RecordedRequest[];
  count(route: string): number;
}

export function fakeGitHub(handler: FakeHandler): FakeGitHub {
  const requests: RecordedRequest[] = [];

  const fetch: FetchLike = async (input, init = {}) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const method = (init.method ?? "GET").toUpperCase();
    const req: RecordedRequest = {
      method,
      url,
      route: `${method} ${url.pathname}`,
      headers: new Headers(init.headers),
      body: typeof init.body === "string" && init.body.length > 0 ? JSON.parse(init.body) : undefined,
    };
    requests.push(req);

    const reply = await handler(req);
    const body =
      reply.body === undefined
        ? null
        : typeof reply.body === "string"
          ? reply.body
          : JSON.stringify(reply.body);
    return new Response(body, {
      status: reply.status,
      headers: { "content-type": "application/json; charset=utf-8", ...reply.headers },
    });
  };

  return {
    fetch,
    requests,
    count: (route) => requests.filter((r) => r.route === route).length,
  };
}

/** A promise plus the function that resolves it. */
export function gate(): { opened: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

let keys: { privateKey: string; publicKey: string } | undefined;

/** Throwaway RSA key pair, generated once per test file. */
export function testKeys(): { privateKey: string; publicKey: string } {
  if (!keys) {
    keys = generateKeyPairSync("rsa", {
      modulusLength: 2048,
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
      publicKeyEncoding: { type: "spki", format: "pem" },
    });
  }
  return keys;
}

export function decodeSegment(segment: string): unknown {
  return JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
}
