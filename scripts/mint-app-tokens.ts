#!/usr/bin/env node
/* eslint-disable no-console */

/**
 * Mint installation tokens for the account logins given on the command line
 * and publish them as the `tokens_json` step output of a GitHub Actions job.
 *
 *   tsx scripts/mint-app-tokens.ts octo-org octocat
 */

import { appendFileSync } from "node:fs";
import { SettingsSchema } from "@ghgql/shared";
import {
  GitHubApp,
  loadConfig,
  makeOctokit,
  mintTokensForOwners,
  settingsFromEnv,
  unescapePem,
} from "@ghgql/provider";

function writeStepOutput(name: string, value: string): void {
  const outPath = process.env.GITHUB_OUTPUT;
  if (!outPath) throw new Error("GITHUB_OUTPUT not set (this script is meant to run in GitHub Actions)");
  appendFileSync(outPath, `${name}=${value}\n`, "utf8");
}

async function main(): Promise<void> {
  const owners = process.argv
    .slice(2)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (owners.length === 0) {
    throw new Error("Usage: mint-app-tokens <owner> [owner...]");
  }

  // No installation id needed: installations are looked up per owner.
  const { appId, appPrivateKey } = SettingsSchema.parse(settingsFromEnv());
  if (!appId || !appPrivateKey) {
    throw new Error("Missing required env vars: GITHUB_APP_ID, GITHUB_APP_PRIVATE_KEY");
  }

  const app = new GitHubApp(makeOctokit({ config: loadConfig() }), appId, unescapePem(appPrivateKey));
  const tokensByOwner = await mintTokensForOwners(app, owners);

  for (const token of Object.values(tokensByOwner)) {
    // Mask before anything could ever print it
    console.log(`::add-mask::${token}`);
  }

  writeStepOutput("tokens_json", JSON.stringify(tokensByOwner));
  console.log(`[mint] Wrote tokens for ${owners.length} owner(s)`);
}

main().catch((err) => {
  console.error(String(err?.stack ?? err));
  process.exit(1);
});
