/**
 * Correlation of everything one owner (the primary or a cluster member)
 * references: extracted secondaries plus owned backups.
 */

import type { PrimaryResource, ScopeResult, UnavailableEntry } from "../types.js";
import { correlateBackups } from "./backups.js";
import { correlateCrossService, type CorrelationContext } from "./cross-service.js";
import { extractReferences, type ExtractedReferences } from "./references.js";

export function malformedEntries(owner: string, extracted: ExtractedReferences): UnavailableEntry[] {
  return extracted.malformed.map((category): UnavailableEntry => ({
    scope: owner,
    category,
    reason: "Malformed",
    message: `${category} reference missing from the ${owner} descriptor`,
  }));
}

export async function correlateScope(
  resource: PrimaryResource,
  ctx: CorrelationContext,
  extracted: ExtractedReferences = extractReferences(resource),
): Promise<ScopeResult> {
  const owner = resource.identifier;
  const [crossService, backups] = await Promise.all([
    correlateCrossService(owner, extracted.references, ctx),
    correlateBackups(owner, resource.kind, ctx),
  ]);

  return {
    owner,
    secondary: crossService.secondary,
    backups: backups.backups,
    unavailable: [...malformedEntries(owner, extracted), ...crossService.unavailable, ...backups.unavailable],
  };
}
