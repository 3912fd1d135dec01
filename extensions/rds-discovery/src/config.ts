/**
 * Discovery Input Configuration
 *
 * Schema-based validation and defaults for the input of one discovery
 * run, shared by the CLI and programmatic callers.
 */

import { z } from "zod";
import { LOG_LEVELS, type DiscoveryLogLevel } from "./logging/index.js";
import type { DiscoveryInput } from "./types.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_TIMEOUT_MS = 120_000;
export const DEFAULT_CONCURRENCY_LIMIT = 8;
export const DEFAULT_LOG_LEVEL: DiscoveryLogLevel = "warn";

export function defaultRegion(env: NodeJS.ProcessEnv = process.env): string {
  return env.AWS_REGION || env.AWS_DEFAULT_REGION || "us-east-1";
}

/**
 * RDS identifiers: 1-63 letters, digits or hyphens, starting with a
 * letter, no trailing or doubled hyphen. RDS stores them lowercased,
 * so input is folded before matching.
 */
export const RDS_IDENTIFIER_PATTERN = /^[A-Za-z](?!.*--)[A-Za-z0-9-]{0,62}(?<!-)$/;

// =============================================================================
// Zod Schemas
// =============================================================================

export const rdsIdentifierSchema = z
  .string()
  .trim()
  .toLowerCase()
  .regex(RDS_IDENTIFIER_PATTERN, "must be 1-63 letters, digits or hyphens and start with a letter");

export const discoveryInputSchema = z.object({
  identifier: rdsIdentifierSchema,
  kind: z.enum(["instance", "cluster"]).default("instance"),
  region: z.string().min(1).optional(),
  credentialProfile: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  concurrencyLimit: z.number().int().positive().max(64).default(DEFAULT_CONCURRENCY_LIMIT),
  includeTags: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL),
});

export type DiscoveryInputOptions = z.input<typeof discoveryInputSchema>;

export type ResolvedDiscoveryConfig = DiscoveryInput & { logLevel: DiscoveryLogLevel };

export type ConfigParseResult =
  | { success: true; data: ResolvedDiscoveryConfig }
  | { success: false; issues: string[] };

/**
 * Validate raw input and fill in defaults
 */
export function parseDiscoveryInput(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): ConfigParseResult {
  const parsed = discoveryInputSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    };
  }

  const { region, ...rest } = parsed.data;
  return {
    success: true,
    data: { ...rest, region: region ?? defaultRegion(env) },
  };
}

/**
 * Reject a credential profile that is not declared in the shared files
 */
export function checkProfile(profile: string | undefined, knownProfiles: string[]): string | undefined {
  if (!profile || knownProfiles.includes(profile)) return undefined;
  const known = knownProfiles.length > 0 ? knownProfiles.join(", ") : "none";
  return `credentialProfile: unknown profile '${profile}' (known: ${known})`;
}
