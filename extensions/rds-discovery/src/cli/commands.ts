/**
 * RDS Discovery CLI Commands
 *
 * Registers `rds-discovery discover <identifier>` and
 * `rds-discovery profiles`.
 */

import { Option, type Command } from "commander";
import { formatErrorMessage } from "../errors.js";
import { listProfileNames } from "../gateway/credentials.js";
import { isLogLevel, LOG_LEVELS } from "../logging/index.js";
import type { DiscoveryInputOptions } from "../config.js";
import { CATEGORY_ORDER, type DiscoveryRunResult, type ResourceGraph, type UnavailableEntry } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type DiscoveryRunner = {
  discover(input: DiscoveryInputOptions): Promise<DiscoveryRunResult>;
};

export type CliContext = {
  program: Command;
  engine: DiscoveryRunner;
  listProfiles?: () => Promise<string[]>;
  /** Defaults to setting `process.exitCode` */
  exit?: (code: number) => void;
};

type DiscoverOptions = {
  cluster?: boolean;
  region?: string;
  profile?: string;
  timeout?: number;
  concurrency?: number;
  tags: boolean;
  json?: boolean;
  logLevel?: string;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;

// =============================================================================
// Helpers
// =============================================================================

/** Simple table formatter for terminal output. */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) => cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

export function formatUnavailable(entry: UnavailableEntry, primaryId: string): string {
  const scope = entry.scope === primaryId ? "" : `${entry.scope}: `;
  const identifier = entry.identifier ? ` ${entry.identifier}` : "";
  const backupType = entry.backupType ? ` [${entry.backupType}]` : "";
  return `${scope}${entry.category}${identifier}${backupType} (${entry.reason})`;
}

function toNumber(value: string): number {
  return Number(value);
}

function renderSummary(graph: ResourceGraph): string {
  const lines: string[] = [];
  const { primary } = graph;
  const engine = [primary.engine, primary.engineVersion].filter(Boolean).join(" ");

  lines.push(`\nRDS ${primary.kind} ${primary.identifier} (${graph.region})`);
  if (engine) lines.push(`Engine: ${engine}  Status: ${primary.status}`);
  lines.push("");

  const rows = CATEGORY_ORDER.flatMap((category) => {
    const count = graph.counts[category];
    return count === undefined ? [] : [[category, String(count)]];
  });
  rows.push(["total", String(graph.total)]);
  lines.push(table(["Category", "Count"], rows));

  const members = graph.members;
  if (members.length > 0) {
    lines.push("");
    lines.push(
      table(
        ["Member", "Role", "Status"],
        members.map((m) => [
          m.identifier,
          m.isWriter ? "writer" : "reader",
          m.status === "resolved" ? m.resource.status : `unavailable (${m.reason})`,
        ]),
      ),
    );
  }

  lines.push("");
  lines.push(`Completeness: ${graph.completeness}`);
  return lines.join("\n");
}

// =============================================================================
// CLI Registration
// =============================================================================

export function registerRdsDiscoveryCli(ctx: CliContext): void {
  const exit =
    ctx.exit ??
    ((code: number) => {
      process.exitCode = code;
    });
  const listProfiles = ctx.listProfiles ?? (() => listProfileNames());

  // ---------------------------------------------------------------------------
  // discover
  // ---------------------------------------------------------------------------
  ctx.program
    .command("discover")
    .description("Discover every resource tied to an RDS instance or cluster")
    .argument("<identifier>", "DB instance or DB cluster identifier")
    .option("--cluster", "Treat the identifier as a DB cluster")
    .option("--region <region>", "AWS region (defaults to AWS_REGION, then us-east-1)")
    .option("--profile <profile>", "Named credential profile")
    .option("--timeout <ms>", "Run timeout in milliseconds", toNumber)
    .option("--concurrency <n>", "Maximum provider calls in flight", toNumber)
    .option("--no-tags", "Skip tag lookups")
    .option("--json", "Print the resource graph as JSON")
    .addOption(new Option("--log-level <level>", "Log verbosity").choices(LOG_LEVELS))
    .action(async (identifier: string, opts: DiscoverOptions) => {
      let result: DiscoveryRunResult;
      try {
        result = await ctx.engine.discover({
          identifier,
          kind: opts.cluster ? "cluster" : "instance",
          region: opts.region,
          credentialProfile: opts.profile,
          timeoutMs: opts.timeout,
          concurrencyLimit: opts.concurrency,
          includeTags: opts.tags,
          logLevel: opts.logLevel !== undefined && isLogLevel(opts.logLevel) ? opts.logLevel : undefined,
        });
      } catch (err) {
        console.error(`error: discovery failed: ${formatErrorMessage(err)}`);
        exit(EXIT_FAILURE);
        return;
      }

      if (!result.success) {
        console.error(`error: ${result.message}`);
        exit(result.reason === "NotFound" ? EXIT_NOT_FOUND : EXIT_FAILURE);
        return;
      }

      const { graph } = result;
      console.log(opts.json ? JSON.stringify(graph, null, 2) : renderSummary(graph));

      if (graph.completeness === "partial") {
        const entries = graph.unavailable.map((entry) => formatUnavailable(entry, graph.primary.identifier));
        const detail = entries.length > 0 ? entries.join(", ") : "primary descriptor incomplete";
        console.error(`warning: partial result; unavailable: ${detail}`);
      }
      exit(EXIT_OK);
    });

  // ---------------------------------------------------------------------------
  // profiles
  // ---------------------------------------------------------------------------
  ctx.program
    .command("profiles")
    .description("List credential profiles from the shared AWS config files")
    .action(async () => {
      let profiles: string[];
      try {
        profiles = await listProfiles();
      } catch (err) {
        console.error(`error: could not read AWS config files: ${formatErrorMessage(err)}`);
        exit(EXIT_FAILURE);
        return;
      }
      if (profiles.length === 0) {
        console.log("No profiles configured.");
      } else {
        for (const profile of profiles) console.log(profile);
      }
      exit(EXIT_OK);
    });
}
