/**
 * Credential Profile Selection
 *
 * Resolves the credential provider for a run and lists the profiles
 * declared in the shared AWS config files.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseIni } from "ini";
import { fromIni, fromNodeProviderChain } from "@aws-sdk/credential-providers";
import type { AwsCredentialIdentityProvider } from "@smithy/types";

const DEFAULT_CREDENTIALS_FILE = join(homedir(), ".aws", "credentials");
const DEFAULT_CONFIG_FILE = join(homedir(), ".aws", "config");

export type ProfileFiles = {
  credentialsFile?: string;
  configFile?: string;
};

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

async function readSections(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }

  const parsed: Record<string, unknown> = parseIni(content);
  return Object.entries(parsed)
    .filter(([, values]) => typeof values === "object" && values !== null)
    .map(([section]) => section);
}

/**
 * List profile names from the credentials and config files.
 *
 * Config-file sections are named `profile <name>` except for `default`;
 * `sso-session` sections are not profiles.
 */
export async function listProfileNames(files: ProfileFiles = {}): Promise<string[]> {
  const credentialsFile = files.credentialsFile ?? process.env.AWS_SHARED_CREDENTIALS_FILE ?? DEFAULT_CREDENTIALS_FILE;
  const configFile = files.configFile ?? process.env.AWS_CONFIG_FILE ?? DEFAULT_CONFIG_FILE;

  const names = new Set<string>(await readSections(credentialsFile));

  for (const section of await readSections(configFile)) {
    if (section.startsWith("sso-session ")) continue;
    names.add(section.startsWith("profile ") ? section.slice("profile ".length).trim() : section);
  }

  return [...names].sort();
}

/**
 * Credential provider for a run: the named profile when one is given,
 * otherwise the SDK's default provider chain.
 */
export function resolveCredentialProvider(profile?: string): AwsCredentialIdentityProvider {
  return profile ? fromIni({ profile }) : fromNodeProviderChain();
}
