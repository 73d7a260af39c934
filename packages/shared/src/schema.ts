import { z } from "zod";

// --- Provider config (github-gql.config.json) ---

export const ConfigSchema = z.object({
  baseUrl: z.string().url().default("https://api.github.com"),
  refreshMarginSeconds: z.number().int().min(0).max(3600).default(60),
  userAgent: z.string().min(1).default("github-gql-provider"),
  previews: z.array(z.string().min(1)).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;

// --- Credential settings ---

const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim().length === 0 ? undefined : v;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

export const SettingsSchema = z.object({
  personalToken: optionalText,
  // Numeric App id or the App's client id; both are accepted as the JWT issuer.
  appId: optionalText,
  appPrivateKey: z.preprocess(
    (v) => blankToUndefined(Buffer.isBuffer(v) ? v.toString("utf8") : v),
    z.string().optional(),
  ),
  installationId: z.preprocess(
    blankToUndefined,
    z.string().trim().regex(/^\d+$/, "must be a numeric id").optional(),
  ),
});

/** Raw credential settings as a host or the environment supplies them. */
export interface SettingsInput {
  personalToken?: string;
  appId?: string;
  appPrivateKey?: string | Buffer;
  installationId?: string;
}

// --- Token issuance response (POST /app/installations/{id}/access_tokens) ---

export const InstallationTokenResponseSchema = z.object({
  token: z.string().min(1),
  expires_at: z.string().datetime({ offset: true }),
});

// --- GraphQL envelope ---

export const GraphQLErrorSchema = z
  .object({
    message: z.string(),
    path: z.array(z.union([z.string(), z.number()])).optional(),
    extensions: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const GraphQLEnvelopeSchema = z
  .object({
    data: z.record(z.unknown()).nullable().optional(),
    errors: z.array(GraphQLErrorSchema).optional(),
  })
  .passthrough()
  .refine((env) => env.data !== undefined || env.errors !== undefined, {
    message: "response has neither data nor errors",
  });

export type GraphQLEnvelope = z.infer<typeof GraphQLEnvelopeSchema>;

// --- Operation handed over by the host ---

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface Operation {
  name: string;
  document: string;
  variables: Record<string, JsonValue>;
}
