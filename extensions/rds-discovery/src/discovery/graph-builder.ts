/**
 * Resource Graph Builder
 *
 * Merges the primary scope and every resolved member scope into one
 * graph keyed by (category, identifier), then derives counts, total and
 * completeness. All output is in canonical order.
 */

import {
  CATEGORY_ORDER,
  SECONDARY_CATEGORIES,
  type BackupArtifact,
  type BackupCategory,
  type ClusterMember,
  type GraphCategory,
  type PrimaryResource,
  type ResourceGraph,
  type ResourceKind,
  type ScopeResult,
  type SecondaryCategory,
  type SecondaryResource,
  type UnavailableEntry,
} from "../types.js";

export type GraphInput = {
  primary: PrimaryResource;
  region: string;
  scope: ScopeResult;
  members: ClusterMember[];
  /** Entries recorded outside any scope, such as a failed primary lookup */
  unavailable?: UnavailableEntry[];
  discoveredAt?: Date;
};

const BASE_COUNT_CATEGORIES: Record<ResourceKind, readonly GraphCategory[]> = {
  instance: ["snapshots", "securityGroups", "subnetGroups", "parameterGroups", "optionGroups"],
  cluster: ["clusterSnapshots", "securityGroups", "subnetGroups", "clusterParameterGroups", "clusterMembers"],
};

const UNAVAILABLE_CATEGORY_ORDER: readonly UnavailableEntry["category"][] = ["primary", ...CATEGORY_ORDER, "tags"];

function compareStrings(a: string | undefined, b: string | undefined): number {
  const left = a ?? "";
  const right = b ?? "";
  return left < right ? -1 : left > right ? 1 : 0;
}

function byIdentifier<T extends { identifier: string }>(a: T, b: T): number {
  return compareStrings(a.identifier, b.identifier);
}

// =============================================================================
// Deduplication
// =============================================================================

/**
 * Lower is preferred: direct before indirect, complete before partial
 */
function preference(resource: SecondaryResource): number {
  return (resource.origin.type === "direct" ? 0 : 2) + (resource.partial ? 1 : 0);
}

export function mergeSecondary(scopes: SecondaryResource[][]): Record<SecondaryCategory, SecondaryResource[]> {
  const merged = new Map<string, SecondaryResource>();
  for (const resources of scopes) {
    for (const resource of resources) {
      const key = `${resource.category}:${resource.identifier}`;
      const existing = merged.get(key);
      if (!existing || preference(resource) < preference(existing)) {
        merged.set(key, resource);
      }
    }
  }

  const grouped: Record<SecondaryCategory, SecondaryResource[]> = {
    securityGroups: [],
    subnetGroups: [],
    parameterGroups: [],
    clusterParameterGroups: [],
    optionGroups: [],
  };
  for (const resource of merged.values()) {
    grouped[resource.category].push(resource);
  }
  for (const category of SECONDARY_CATEGORIES) {
    grouped[category].sort(byIdentifier);
  }
  return grouped;
}

export function mergeBackups(scopes: BackupArtifact[][]): Record<BackupCategory, BackupArtifact[]> {
  const merged = new Map<string, BackupArtifact>();
  for (const artifacts of scopes) {
    for (const artifact of artifacts) {
      const key = `${artifact.category}:${artifact.identifier}`;
      if (!merged.has(key)) merged.set(key, artifact);
    }
  }

  const grouped: Record<BackupCategory, BackupArtifact[]> = { snapshots: [], clusterSnapshots: [] };
  for (const artifact of merged.values()) {
    grouped[artifact.category].push(artifact);
  }
  grouped.snapshots.sort(byIdentifier);
  grouped.clusterSnapshots.sort(byIdentifier);
  return grouped;
}

function unavailableKey(entry: UnavailableEntry): string {
  return [entry.scope, entry.category, entry.identifier ?? "", entry.backupType ?? ""].join("\u0000");
}

export function compareUnavailable(a: UnavailableEntry, b: UnavailableEntry): number {
  const byCategory = UNAVAILABLE_CATEGORY_ORDER.indexOf(a.category) - UNAVAILABLE_CATEGORY_ORDER.indexOf(b.category);
  if (byCategory !== 0) return byCategory;
  return (
    compareStrings(a.scope, b.scope) ||
    compareStrings(a.identifier, b.identifier) ||
    compareStrings(a.backupType, b.backupType)
  );
}

export function mergeUnavailable(entries: UnavailableEntry[]): UnavailableEntry[] {
  const merged = new Map<string, UnavailableEntry>();
  for (const entry of entries) {
    const key = unavailableKey(entry);
    if (!merged.has(key)) merged.set(key, entry);
  }
  return [...merged.values()].sort(compareUnavailable);
}

// =============================================================================
// Graph Assembly
// =============================================================================

function memberUnavailable(member: ClusterMember): UnavailableEntry[] {
  if (member.status === "resolved") return member.unavailable;
  return [
    {
      scope: member.clusterIdentifier,
      category: "clusterMembers",
      identifier: member.identifier,
      reason: member.reason,
      message: member.message,
    },
  ];
}

export function computeCounts(
  kind: ResourceKind,
  secondary: Record<SecondaryCategory, SecondaryResource[]>,
  backups: Record<BackupCategory, BackupArtifact[]>,
  members: ClusterMember[],
): Partial<Record<GraphCategory, number>> {
  const sizes: Record<GraphCategory, number> = {
    snapshots: backups.snapshots.length,
    clusterSnapshots: backups.clusterSnapshots.length,
    securityGroups: secondary.securityGroups.length,
    subnetGroups: secondary.subnetGroups.length,
    parameterGroups: secondary.parameterGroups.length,
    clusterParameterGroups: secondary.clusterParameterGroups.length,
    optionGroups: secondary.optionGroups.length,
    clusterMembers: kind === "cluster" ? members.filter((m) => m.status === "resolved").length : 0,
  };

  const base = BASE_COUNT_CATEGORIES[kind];
  const counts: Partial<Record<GraphCategory, number>> = {};
  for (const category of CATEGORY_ORDER) {
    if (base.includes(category) || sizes[category] > 0) {
      counts[category] = sizes[category];
    }
  }
  return counts;
}

export function sumCounts(counts: Partial<Record<GraphCategory, number>>): number {
  let total = 0;
  for (const category of CATEGORY_ORDER) {
    total += counts[category] ?? 0;
  }
  return total;
}

export function buildResourceGraph(input: GraphInput): ResourceGraph {
  const { primary, scope } = input;
  const members = primary.kind === "cluster" ? input.members : [];
  const resolved = members.flatMap((m) => (m.status === "resolved" ? [m] : []));

  const secondary = mergeSecondary([scope.secondary, ...resolved.map((m) => m.secondary)]);
  const backups = mergeBackups([scope.backups, ...resolved.map((m) => m.backups)]);
  const unavailable = mergeUnavailable([
    ...(input.unavailable ?? []),
    ...scope.unavailable,
    ...members.flatMap(memberUnavailable),
  ]);

  const counts = computeCounts(primary.kind, secondary, backups, members);
  const completePrimaryInfo = !primary.partial;

  return {
    primary,
    region: input.region,
    secondary,
    backups,
    members,
    counts,
    total: sumCounts(counts) + 1,
    completeness: unavailable.length === 0 && completePrimaryInfo ? "complete" : "partial",
    completePrimaryInfo,
    unavailable,
    discoveredAt: (input.discoveredAt ?? new Date()).toISOString(),
  };
}
