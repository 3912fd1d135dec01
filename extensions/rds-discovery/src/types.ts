/**
 * RDS Resource Discovery Types
 *
 * Shared data model for one discovery run: the primary database
 * resource, the secondary resources and backups it is tied to, and the
 * aggregated resource graph handed to output collaborators.
 */

// =============================================================================
// Kinds & Categories
// =============================================================================

export type ResourceKind = "instance" | "cluster";

/**
 * Normalized provider failure taxonomy
 */
export type FailureKind = "NotFound" | "AccessDenied" | "RateLimited" | "Transient" | "Malformed";

/**
 * Why a lookup contributed nothing (or only a partial record) to the graph
 */
export type UnavailableReason = FailureKind | "timeout" | "ambiguous-origin";

export type SecondaryCategory =
  | "securityGroups"
  | "subnetGroups"
  | "parameterGroups"
  | "clusterParameterGroups"
  | "optionGroups";

export type BackupCategory = "snapshots" | "clusterSnapshots";

export type BackupType = "manual" | "automated";

/**
 * Every category that can appear in the graph's counts
 */
export type GraphCategory = SecondaryCategory | BackupCategory | "clusterMembers";

/**
 * Canonical category ordering used for all sorted output
 */
export const CATEGORY_ORDER: readonly GraphCategory[] = [
  "snapshots",
  "clusterSnapshots",
  "securityGroups",
  "subnetGroups",
  "parameterGroups",
  "clusterParameterGroups",
  "optionGroups",
  "clusterMembers",
];

export const SECONDARY_CATEGORIES: readonly SecondaryCategory[] = [
  "securityGroups",
  "subnetGroups",
  "parameterGroups",
  "clusterParameterGroups",
  "optionGroups",
];

// =============================================================================
// Primary Resource
// =============================================================================

/**
 * References a primary resource embeds. A field left undefined means the
 * provider payload did not carry it at all (as opposed to an empty list).
 */
export type EmbeddedReferences = {
  securityGroupIds?: string[];
  subnetGroupName?: string;
  parameterGroupNames?: string[];
  clusterParameterGroupName?: string;
  optionGroupNames?: string[];
  members?: ClusterMemberRef[];
};

export type ClusterMemberRef = {
  instanceIdentifier: string;
  isWriter: boolean;
  promotionTier?: number;
};

export type PrimaryResource = {
  identifier: string;
  kind: ResourceKind;
  arn?: string;
  engine: string;
  engineVersion: string;
  status: string;
  instanceClass?: string;
  storageType?: string;
  allocatedStorageGb: number;
  encrypted: boolean;
  multiAz: boolean;
  availabilityZones: string[];
  vpcId?: string;
  endpoint?: { address: string; port?: number };
  readerEndpoint?: string;
  /** Owning cluster (lookup only, for instances that belong to one) */
  clusterIdentifier?: string;
  createdAt?: string;
  tags: Record<string, string>;
  references: EmbeddedReferences;
  /** Set when the descriptor is a stub or is missing fields */
  partial: boolean;
};

// =============================================================================
// Secondary Resources
// =============================================================================

export type ReferenceOrigin =
  | { type: "direct"; owner: string }
  | { type: "indirect"; owner: string; via: string };

export type MetadataValue = string | number | boolean | string[] | undefined;

export type SecondaryResource = {
  category: SecondaryCategory;
  identifier: string;
  name: string;
  arn?: string;
  origin: ReferenceOrigin;
  metadata: Record<string, MetadataValue>;
  tags: Record<string, string>;
  /** Security groups only: groups referenced from ingress/egress rules */
  referencedGroupIds?: string[];
  partial: boolean;
};

/**
 * A (category, identifier) pair extracted from a primary resource
 */
export type ResourceReference = {
  category: SecondaryCategory;
  identifier: string;
};

// =============================================================================
// Backups
// =============================================================================

export type BackupArtifact = {
  category: BackupCategory;
  identifier: string;
  arn?: string;
  /** Identifier of the instance or cluster the artifact was taken from */
  origin?: string;
  type: BackupType;
  status: string;
  createdAt?: string;
  allocatedStorageGb: number;
  encrypted: boolean;
  engine?: string;
  engineVersion?: string;
  tags: Record<string, string>;
};

// =============================================================================
// Unavailable Entries & Scopes
// =============================================================================

export type UnavailableEntry = {
  /** Identifier of the primary resource or cluster member the lookup ran for */
  scope: string;
  category: GraphCategory | "primary" | "tags";
  identifier?: string;
  backupType?: BackupType;
  reason: UnavailableReason;
  message?: string;
};

/**
 * Everything correlated for one owner (the primary or one member)
 */
export type ScopeResult = {
  owner: string;
  secondary: SecondaryResource[];
  backups: BackupArtifact[];
  unavailable: UnavailableEntry[];
};

export type ClusterMember =
  | {
      status: "resolved";
      identifier: string;
      clusterIdentifier: string;
      isWriter: boolean;
      promotionTier?: number;
      resource: PrimaryResource;
      secondary: SecondaryResource[];
      backups: BackupArtifact[];
      unavailable: UnavailableEntry[];
    }
  | {
      status: "unavailable";
      identifier: string;
      clusterIdentifier: string;
      isWriter: boolean;
      promotionTier?: number;
      reason: UnavailableReason;
      message?: string;
    };

// =============================================================================
// Resource Graph
// =============================================================================

export type Completeness = "complete" | "partial";

export type ResourceGraph = {
  primary: PrimaryResource;
  region: string;
  secondary: Record<SecondaryCategory, SecondaryResource[]>;
  backups: Record<BackupCategory, BackupArtifact[]>;
  members: ClusterMember[];
  counts: Partial<Record<GraphCategory, number>>;
  total: number;
  completeness: Completeness;
  completePrimaryInfo: boolean;
  unavailable: UnavailableEntry[];
  discoveredAt: string;
};

// =============================================================================
// Run Input & Result
// =============================================================================

export type DiscoveryInput = {
  identifier: string;
  kind: ResourceKind;
  region: string;
  credentialProfile?: string;
  timeoutMs: number;
  concurrencyLimit: number;
  includeTags: boolean;
};

export type DiscoveryRunResult =
  | { success: true; graph: ResourceGraph }
  | {
      success: false;
      reason: "NotFound" | "InvalidInput";
      identifier: string;
      kind: ResourceKind;
      message: string;
    };
