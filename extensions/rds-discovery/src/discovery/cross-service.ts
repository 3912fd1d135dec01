/**
 * Cross-Service Correlator
 *
 * Resolves the secondary references of one owner (the primary or a
 * cluster member) and expands security groups exactly one hop through
 * the groups their rules reference.
 */

import { formatErrorMessage, toUnavailableReason } from "../errors.js";
import { silentLogger, type DiscoveryLogger } from "../logging/index.js";
import type { ProviderGateway, SecondaryDescriptor } from "../gateway/provider.js";
import type {
  ReferenceOrigin,
  ResourceReference,
  SecondaryResource,
  UnavailableEntry,
} from "../types.js";
import { compareReferences } from "./references.js";

export type CorrelationContext = {
  gateway: ProviderGateway;
  includeTags: boolean;
  logger?: DiscoveryLogger;
};

export type CrossServiceResult = {
  secondary: SecondaryResource[];
  unavailable: UnavailableEntry[];
};

type ResolvedSlot = {
  resource?: SecondaryResource;
  unavailable: UnavailableEntry[];
};

function stubResource(reference: ResourceReference, origin: ReferenceOrigin): SecondaryResource {
  return {
    category: reference.category,
    identifier: reference.identifier,
    name: reference.identifier,
    origin,
    metadata: {},
    tags: {},
    partial: true,
  };
}

async function attachTags(
  descriptor: SecondaryDescriptor,
  owner: string,
  ctx: CorrelationContext,
): Promise<{ tags: Record<string, string>; unavailable?: UnavailableEntry }> {
  // EC2 returns security group tags inline; RDS groups need a separate call
  if (!ctx.includeTags || descriptor.category === "securityGroups" || !descriptor.arn) {
    return { tags: ctx.includeTags ? descriptor.tags : {} };
  }
  try {
    const fetched = await ctx.gateway.listTags(descriptor.arn);
    return { tags: { ...descriptor.tags, ...fetched } };
  } catch (err) {
    return {
      tags: descriptor.tags,
      unavailable: {
        scope: owner,
        category: "tags",
        identifier: descriptor.identifier,
        reason: toUnavailableReason(err),
        message: formatErrorMessage(err),
      },
    };
  }
}

async function resolveReference(
  reference: ResourceReference,
  origin: ReferenceOrigin,
  ctx: CorrelationContext,
): Promise<ResolvedSlot> {
  const logger = ctx.logger ?? silentLogger;
  let descriptor: SecondaryDescriptor;
  try {
    descriptor = await ctx.gateway.describeSecondary(reference.category, reference.identifier);
  } catch (err) {
    const reason = toUnavailableReason(err);
    const message = formatErrorMessage(err);
    logger.debug(`Could not resolve ${reference.category} ${reference.identifier}`, { reason, message });
    return {
      resource: reason === "Malformed" ? stubResource(reference, origin) : undefined,
      unavailable: [{ scope: origin.owner, category: reference.category, identifier: reference.identifier, reason, message }],
    };
  }

  const { tags, unavailable } = await attachTags(descriptor, origin.owner, ctx);
  return {
    resource: { ...descriptor, tags, origin },
    unavailable: unavailable ? [unavailable] : [],
  };
}

/**
 * Groups referenced from the rules of the direct groups that are not
 * direct themselves, each mapped to the first direct group naming it
 */
function indirectGroupIds(direct: SecondaryResource[], directIds: Set<string>): Map<string, string> {
  const indirect = new Map<string, string>();
  for (const group of direct) {
    for (const referenced of group.referencedGroupIds ?? []) {
      if (directIds.has(referenced) || indirect.has(referenced)) continue;
      indirect.set(referenced, group.identifier);
    }
  }
  return indirect;
}

export async function correlateCrossService(
  owner: string,
  references: ResourceReference[],
  ctx: CorrelationContext,
): Promise<CrossServiceResult> {
  const directSlots = await Promise.all(
    references.map((reference) => resolveReference(reference, { type: "direct", owner }, ctx)),
  );

  const directIds = new Set(
    references.filter((ref) => ref.category === "securityGroups").map((ref) => ref.identifier),
  );
  const directGroups = directSlots
    .map((slot) => slot.resource)
    .filter((resource): resource is SecondaryResource => resource?.category === "securityGroups")
    .sort((a, b) => compareReferences(a, b));

  const indirectSlots = await Promise.all(
    [...indirectGroupIds(directGroups, directIds)].map(([identifier, via]) =>
      resolveReference({ category: "securityGroups", identifier }, { type: "indirect", owner, via }, ctx),
    ),
  );

  const slots = [...directSlots, ...indirectSlots];
  const secondary = slots
    .map((slot) => slot.resource)
    .filter((resource): resource is SecondaryResource => resource !== undefined)
    .sort(compareReferences);

  return {
    secondary,
    unavailable: slots.flatMap((slot) => slot.unavailable),
  };
}
