/**
 * Backup Correlator
 *
 * Lists manual and automated snapshots for one owner and keeps only the
 * artifacts whose recorded origin is that owner. Server-side filters
 * narrow the listing; the origin check decides attribution.
 */

import { formatErrorMessage, toUnavailableReason } from "../errors.js";
import type { BackupListing } from "../gateway/provider.js";
import { silentLogger } from "../logging/index.js";
import type {
  BackupArtifact,
  BackupCategory,
  BackupType,
  ResourceKind,
  UnavailableEntry,
} from "../types.js";
import type { CorrelationContext } from "./cross-service.js";

export const BACKUP_TYPES: readonly BackupType[] = ["manual", "automated"];

export type BackupResult = {
  backups: BackupArtifact[];
  unavailable: UnavailableEntry[];
};

export function backupCategoryFor(kind: ResourceKind): BackupCategory {
  return kind === "cluster" ? "clusterSnapshots" : "snapshots";
}

async function listOwnedBackups(
  owner: string,
  kind: ResourceKind,
  backupType: BackupType,
  ctx: CorrelationContext,
): Promise<BackupResult> {
  const logger = ctx.logger ?? silentLogger;
  const category = backupCategoryFor(kind);

  let listing: BackupListing;
  try {
    listing = await ctx.gateway.listBackups(owner, kind, backupType);
  } catch (err) {
    return {
      backups: [],
      unavailable: [
        {
          scope: owner,
          category,
          backupType,
          reason: toUnavailableReason(err),
          message: formatErrorMessage(err),
        },
      ],
    };
  }

  const backups: BackupArtifact[] = [];
  const unavailable: UnavailableEntry[] = [];

  if (listing.malformed > 0) {
    unavailable.push({
      scope: owner,
      category,
      backupType,
      reason: "Malformed",
      message: `${listing.malformed} snapshot(s) listed without an identifier`,
    });
  }

  for (const artifact of listing.artifacts) {
    if (artifact.origin === undefined) {
      unavailable.push({
        scope: owner,
        category,
        identifier: artifact.identifier,
        backupType,
        reason: "ambiguous-origin",
        message: "snapshot does not record the resource it was taken from",
      });
      continue;
    }
    if (artifact.origin !== owner) {
      logger.debug(`Dropping ${artifact.identifier}: taken from ${artifact.origin}, not ${owner}`);
      continue;
    }
    backups.push(ctx.includeTags ? artifact : { ...artifact, tags: {} });
  }

  return { backups, unavailable };
}

export async function correlateBackups(
  owner: string,
  kind: ResourceKind,
  ctx: CorrelationContext,
): Promise<BackupResult> {
  const results = await Promise.all(BACKUP_TYPES.map((backupType) => listOwnedBackups(owner, kind, backupType, ctx)));

  const byIdentifier = new Map<string, BackupArtifact>();
  for (const result of results) {
    for (const artifact of result.backups) {
      if (!byIdentifier.has(artifact.identifier)) byIdentifier.set(artifact.identifier, artifact);
    }
  }

  return {
    backups: [...byIdentifier.values()].sort((a, b) => (a.identifier < b.identifier ? -1 : 1)),
    unavailable: results.flatMap((result) => result.unavailable),
  };
}
