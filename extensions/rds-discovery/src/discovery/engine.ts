/**
 * Discovery Engine
 *
 * Drives one run: Validate → FetchPrimary → ExtractReferences →
 * {CorrelateCrossService, CorrelateBackups} → ExpandMembers → Aggregate.
 *
 * Every provider call goes through a per-run {@link TaskPool}, so the
 * concurrency ceiling and the run timeout apply uniformly. Only a
 * `NotFound` primary and invalid input end a run without a graph.
 */

import { randomUUID } from "node:crypto";

import { checkProfile, parseDiscoveryInput, type DiscoveryInputOptions } from "../config.js";
import { formatErrorMessage, toUnavailableReason } from "../errors.js";
import { createAwsProviderGateway } from "../gateway/aws-gateway.js";
import { listProfileNames, resolveCredentialProvider } from "../gateway/credentials.js";
import type { ProviderGateway } from "../gateway/provider.js";
import { createDiscoveryLogger, type DiscoveryLogger } from "../logging/index.js";
import type {
  ClusterMember,
  DiscoveryInput,
  DiscoveryRunResult,
  PrimaryResource,
  ResourceKind,
  ScopeResult,
  UnavailableEntry,
} from "../types.js";
import { correlateBackups } from "./backups.js";
import { expandCluster } from "./cluster.js";
import type { CorrelationContext } from "./cross-service.js";
import { buildResourceGraph } from "./graph-builder.js";
import { createLimitedGateway, TaskPool } from "./pool.js";
import { extractReferences } from "./references.js";
import { correlateScope } from "./scope.js";

export type GatewayFactory = (input: DiscoveryInput, logger: DiscoveryLogger) => ProviderGateway;

export type DiscoveryEngineOptions = {
  gatewayFactory?: GatewayFactory;
  /** Profiles a `credentialProfile` is checked against */
  listProfiles?: () => Promise<string[]>;
  logger?: DiscoveryLogger;
  now?: () => Date;
};

export const defaultGatewayFactory: GatewayFactory = (input, logger) =>
  createAwsProviderGateway({
    region: input.region,
    credentials: resolveCredentialProvider(input.credentialProfile),
    logger: logger.child("gateway"),
  });

/**
 * Placeholder for a primary that could be neither described nor ruled out
 */
export function stubPrimary(identifier: string, kind: ResourceKind): PrimaryResource {
  return {
    identifier,
    kind,
    engine: "",
    engineVersion: "",
    status: "unknown",
    allocatedStorageGb: 0,
    encrypted: false,
    multiAz: false,
    availabilityZones: [],
    tags: {},
    references: {},
    partial: true,
  };
}

export class DiscoveryEngine {
  private gatewayFactory: GatewayFactory;
  private listProfiles: () => Promise<string[]>;
  private logger?: DiscoveryLogger;
  private now: () => Date;

  constructor(options: DiscoveryEngineOptions = {}) {
    this.gatewayFactory = options.gatewayFactory ?? defaultGatewayFactory;
    this.listProfiles = options.listProfiles ?? (() => listProfileNames());
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async discover(raw: DiscoveryInputOptions): Promise<DiscoveryRunResult> {
    const identifier = raw.identifier;
    const requestedKind: ResourceKind = raw.kind ?? "instance";

    // Validate
    const parsed = parseDiscoveryInput(raw);
    if (!parsed.success) {
      return {
        success: false,
        reason: "InvalidInput",
        identifier,
        kind: requestedKind,
        message: parsed.issues.join("; "),
      };
    }
    const { logLevel, ...input } = parsed.data;
    const logger = this.logger ?? createDiscoveryLogger("engine", { level: logLevel });

    if (input.credentialProfile) {
      let profiles: string[];
      try {
        profiles = await this.listProfiles();
      } catch (err) {
        return {
          success: false,
          reason: "InvalidInput",
          identifier: input.identifier,
          kind: input.kind,
          message: `credentialProfile: could not read AWS config files: ${formatErrorMessage(err)}`,
        };
      }
      const problem = checkProfile(input.credentialProfile, profiles);
      if (problem) {
        return { success: false, reason: "InvalidInput", identifier: input.identifier, kind: input.kind, message: problem };
      }
    }

    return this.run(input, logger);
  }

  private async run(input: DiscoveryInput, baseLogger: DiscoveryLogger): Promise<DiscoveryRunResult> {
    const logger = baseLogger.withContext({
      runId: randomUUID(),
      resourceId: input.identifier,
      region: input.region,
    });
    const startedAt = Date.now();
    logger.info(`Discovering ${input.kind} ${input.identifier}`, {
      timeoutMs: input.timeoutMs,
      concurrencyLimit: input.concurrencyLimit,
    });

    const controller = new AbortController();
    const timer = setTimeout(() => {
      logger.warn(`Run timed out after ${input.timeoutMs}ms; abandoning outstanding lookups`);
      controller.abort();
    }, input.timeoutMs);

    try {
      const pool = new TaskPool(input.concurrencyLimit, controller.signal, logger.child("pool"));
      const ctx: CorrelationContext = {
        gateway: createLimitedGateway(this.gatewayFactory(input, logger), pool),
        includeTags: input.includeTags,
        logger,
      };

      // FetchPrimary
      let primary: PrimaryResource;
      const runUnavailable: UnavailableEntry[] = [];
      try {
        primary = await ctx.gateway.describePrimary(input.identifier, input.kind);
        if (!input.includeTags) primary = { ...primary, tags: {} };
      } catch (err) {
        const reason = toUnavailableReason(err);
        const message = formatErrorMessage(err);
        if (reason === "NotFound") {
          logger.info(`No ${input.kind} named ${input.identifier}`);
          return { success: false, reason: "NotFound", identifier: input.identifier, kind: input.kind, message };
        }
        logger.warn(`Primary lookup failed (${reason}); continuing with owner-id correlation only`, { message });
        primary = stubPrimary(input.identifier, input.kind);
        runUnavailable.push({ scope: input.identifier, category: "primary", identifier: input.identifier, reason, message });
      }

      let scope: ScopeResult;
      let members: ClusterMember[] = [];

      if (runUnavailable.length > 0) {
        const backups = await correlateBackups(primary.identifier, primary.kind, ctx);
        scope = { owner: primary.identifier, secondary: [], backups: backups.backups, unavailable: backups.unavailable };
      } else {
        // ExtractReferences, then fan out
        const extracted = extractReferences(primary);
        [scope, members] = await Promise.all([
          correlateScope(primary, ctx, extracted),
          expandCluster(primary, extracted.members, ctx),
        ]);
      }

      // Aggregate
      const graph = buildResourceGraph({
        primary,
        region: input.region,
        scope,
        members,
        unavailable: runUnavailable,
        discoveredAt: this.now(),
      });

      for (const entry of graph.unavailable) {
        logger.warn(`Unavailable: ${entry.category}${entry.identifier ? ` ${entry.identifier}` : ""}`, {
          scope: entry.scope,
          reason: entry.reason,
          backupType: entry.backupType,
        });
      }
      logger.info(`Discovery ${graph.completeness}: ${graph.total} resources`, {
        durationMs: Date.now() - startedAt,
        counts: graph.counts,
      });

      return { success: true, graph };
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Run one discovery with a throwaway engine
 */
export async function discover(
  input: DiscoveryInputOptions,
  options: DiscoveryEngineOptions = {},
): Promise<DiscoveryRunResult> {
  return new DiscoveryEngine(options).discover(input);
}
