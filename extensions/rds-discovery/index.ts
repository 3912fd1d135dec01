/**
 * RDS Resource Discovery Extension
 *
 * Discovers every billable resource tied to one Amazon RDS DB instance
 * or DB cluster (security groups, subnet groups, parameter and option
 * groups, snapshots, cluster members) and merges them into one
 * deduplicated resource graph.
 *
 * Provides:
 * - DiscoveryEngine for programmatic use
 * - ProviderGateway contract with an AWS SDK v3 implementation
 * - `rds-discovery discover|profiles` CLI commands
 */

export { DiscoveryEngine, discover, stubPrimary, defaultGatewayFactory } from "./src/discovery/engine.js";
export type { DiscoveryEngineOptions, GatewayFactory } from "./src/discovery/engine.js";
export { buildResourceGraph, computeCounts, sumCounts } from "./src/discovery/graph-builder.js";
export { extractReferences } from "./src/discovery/references.js";
export { correlateCrossService } from "./src/discovery/cross-service.js";
export type { CorrelationContext } from "./src/discovery/cross-service.js";
export { correlateBackups } from "./src/discovery/backups.js";
export { expandCluster } from "./src/discovery/cluster.js";
export { TaskPool, createLimitedGateway } from "./src/discovery/pool.js";

export { AwsProviderGateway, createAwsProviderGateway } from "./src/gateway/aws-gateway.js";
export type { AwsGatewayConfig } from "./src/gateway/aws-gateway.js";
export type { ProviderGateway, SecondaryDescriptor, BackupListing, CallOptions } from "./src/gateway/provider.js";
export { listProfileNames, resolveCredentialProvider } from "./src/gateway/credentials.js";

export { ProviderError, DiscoveryTimeoutError, classifyProviderError } from "./src/errors.js";
export { parseDiscoveryInput, discoveryInputSchema, DEFAULT_TIMEOUT_MS, DEFAULT_CONCURRENCY_LIMIT } from "./src/config.js";
export type { DiscoveryInputOptions } from "./src/config.js";
export { createDiscoveryLogger } from "./src/logging/index.js";
export type { DiscoveryLogger, DiscoveryLogLevel } from "./src/logging/index.js";
export { registerRdsDiscoveryCli } from "./src/cli/commands.js";
export type { CliContext } from "./src/cli/commands.js";

export { CATEGORY_ORDER } from "./src/types.js";
export type {
  ResourceKind,
  FailureKind,
  UnavailableReason,
  SecondaryCategory,
  BackupCategory,
  BackupType,
  GraphCategory,
  PrimaryResource,
  SecondaryResource,
  BackupArtifact,
  ClusterMember,
  UnavailableEntry,
  ResourceGraph,
  DiscoveryInput,
  DiscoveryRunResult,
} from "./src/types.js";
