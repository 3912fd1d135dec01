/**
 * Cluster Expander
 *
 * Treats every member instance of a cluster as a nested primary and
 * correlates its own secondaries and backups.
 */

import { formatErrorMessage, toUnavailableReason } from "../errors.js";
import { silentLogger } from "../logging/index.js";
import type { ClusterMember, ClusterMemberRef, PrimaryResource } from "../types.js";
import type { CorrelationContext } from "./cross-service.js";
import { correlateScope } from "./scope.js";

async function expandMember(
  clusterIdentifier: string,
  member: ClusterMemberRef,
  ctx: CorrelationContext,
): Promise<ClusterMember> {
  const logger = ctx.logger ?? silentLogger;
  const base = {
    identifier: member.instanceIdentifier,
    clusterIdentifier,
    isWriter: member.isWriter,
    promotionTier: member.promotionTier,
  };

  let resource: PrimaryResource;
  try {
    resource = await ctx.gateway.describePrimary(member.instanceIdentifier, "instance");
  } catch (err) {
    const reason = toUnavailableReason(err);
    logger.debug(`Cluster member ${member.instanceIdentifier} unavailable`, { reason });
    return { status: "unavailable", ...base, reason, message: formatErrorMessage(err) };
  }

  if (!ctx.includeTags) resource = { ...resource, tags: {} };
  const scope = await correlateScope(resource, ctx);

  return {
    status: "resolved",
    ...base,
    resource,
    secondary: scope.secondary,
    backups: scope.backups,
    unavailable: scope.unavailable,
  };
}

export async function expandCluster(
  cluster: PrimaryResource,
  members: ClusterMemberRef[],
  ctx: CorrelationContext,
): Promise<ClusterMember[]> {
  if (cluster.kind !== "cluster") return [];
  const expanded = await Promise.all(members.map((member) => expandMember(cluster.identifier, member, ctx)));
  return expanded.sort((a, b) => (a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0));
}
