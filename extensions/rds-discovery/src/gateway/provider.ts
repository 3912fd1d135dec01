/**
 * Provider Gateway contract
 *
 * The narrow set of read-only lookups the correlation logic depends on.
 * Implementations retry transient failures themselves and reject with a
 * {@link ProviderError} carrying a normalized failure kind.
 */

import type {
  BackupArtifact,
  BackupType,
  PrimaryResource,
  ResourceKind,
  SecondaryCategory,
  SecondaryResource,
} from "../types.js";

export type CallOptions = {
  signal?: AbortSignal;
};

/**
 * A secondary resource as the provider describes it, before the
 * correlator decides how it was reached
 */
export type SecondaryDescriptor = Omit<SecondaryResource, "origin">;

export type BackupListing = {
  artifacts: BackupArtifact[];
  /** Items the provider returned without an identifier; skipped */
  malformed: number;
};

export interface ProviderGateway {
  /** Rejects with `NotFound` when no resource has this exact identifier */
  describePrimary(identifier: string, kind: ResourceKind, options?: CallOptions): Promise<PrimaryResource>;

  describeSecondary(
    category: SecondaryCategory,
    identifier: string,
    options?: CallOptions,
  ): Promise<SecondaryDescriptor>;

  /** Drains pagination before resolving */
  listBackups(
    ownerIdentifier: string,
    kind: ResourceKind,
    backupType: BackupType,
    options?: CallOptions,
  ): Promise<BackupListing>;

  listTags(resourceArn: string, options?: CallOptions): Promise<Record<string, string>>;
}
