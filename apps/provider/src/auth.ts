import { SettingsSchema, type Credential, type SettingsInput } from "@ghgql/shared";
import { ConfigurationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Settings from the environment
// ---------------------------------------------------------------------------

export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): SettingsInput {
  return {
    personalToken: env.GITHUB_TOKEN,
    appId: env.GITHUB_APP_ID,
    appPrivateKey: env.GITHUB_APP_PRIVATE_KEY,
    installationId: env.GITHUB_APP_INSTALLATION_ID,
  };
}

// Secrets often store newlines as \n
export function unescapePem(pem: string): string {
  return pem.includes("\\n") ? pem.replace(/\\n/g, "\n") : pem;
}

// ---------------------------------------------------------------------------
// Credential resolution
// ---------------------------------------------------------------------------

/**
 * Decide which credential scheme the settings describe.
 *
 * A personal token must stand alone. The App scheme needs all of
 * appId, appPrivateKey and installationId.
 */
export function resolveCredential(input: SettingsInput): Credential {
  const parsed = SettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid GitHub credential settings", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  const { personalToken, appId, appPrivateKey, installationId } = parsed.data;

  const appFields = { appId, appPrivateKey, installationId };
  const presentApp = Object.entries(appFields)
    .filter(([, v]) => v !== undefined)
    .map(([k]) => k);

  if (personalToken !== undefined && presentApp.length > 0) {
    throw new ConfigurationError(
      "Both a personal token and GitHub App settings are configured - pick one",
      { appSettings: presentApp },
    );
  }

  if (personalToken !== undefined) {
    console.log("[auth] Mode: personal access token");
    return { kind: "personal", value: personalToken };
  }

  if (appId !== undefined && appPrivateKey !== undefined && installationId !== undefined) {
    console.log(`[auth] Mode: GitHub App ${appId}, installation ${installationId}`);
    return {
      kind: "app",
      appId,
      privateKey: unescapePem(appPrivateKey),
      installationId,
    };
  }

  if (presentApp.length > 0) {
    const missing = Object.keys(appFields).filter((k) => !presentApp.includes(k));
    throw new ConfigurationError(
      `Incomplete GitHub App settings - missing ${missing.join(", ")}`,
      { missing },
    );
  }

  throw new ConfigurationError(
    "No authentication configured. Set one of:\n" +
      "  - personalToken (GITHUB_TOKEN)\n" +
      "  - appId + appPrivateKey + installationId " +
      "(GITHUB_APP_ID, GITHUB_APP_PRIVATE_KEY, GITHUB_APP_INSTALLATION_ID)",
  );
}
