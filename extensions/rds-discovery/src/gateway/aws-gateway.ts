/**
 * AWS Provider Gateway
 * Read-only RDS and EC2 lookups behind the ProviderGateway contract
 */

import {
  RDSClient,
  DescribeDBInstancesCommand,
  DescribeDBClustersCommand,
  DescribeDBSnapshotsCommand,
  DescribeDBClusterSnapshotsCommand,
  DescribeDBSubnetGroupsCommand,
  DescribeDBParameterGroupsCommand,
  DescribeDBClusterParameterGroupsCommand,
  DescribeOptionGroupsCommand,
  ListTagsForResourceCommand,
  type Tag,
  type DBInstance,
  type DBCluster,
  type DBSnapshot,
  type DBClusterSnapshot,
} from "@aws-sdk/client-rds";

import {
  EC2Client,
  DescribeSecurityGroupsCommand,
  type IpPermission,
  type SecurityGroup,
  type Tag as EC2Tag,
} from "@aws-sdk/client-ec2";

import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from "@smithy/types";

import { DiscoveryTimeoutError, ProviderError, toProviderError } from "../errors.js";
import { createProviderRetryRunner, type ProviderRetryOptions } from "../retry.js";
import { silentLogger, type DiscoveryLogger } from "../logging/index.js";
import type {
  BackupArtifact,
  BackupType,
  PrimaryResource,
  ResourceKind,
  SecondaryCategory,
} from "../types.js";
import type { BackupListing, CallOptions, ProviderGateway, SecondaryDescriptor } from "./provider.js";

/** Per-request options handed to `client.send` */
type SendOptions = { abortSignal?: AbortSignal };

export type AwsGatewayConfig = {
  region: string;
  credentials?: AwsCredentialIdentity | AwsCredentialIdentityProvider;
  logger?: DiscoveryLogger;
  retry?: ProviderRetryOptions["retry"];
};

// ============================================================================
// Mapping Helpers
// ============================================================================

function tagsToRecord(tags?: Array<Tag | EC2Tag>): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      record[tag.Key] = tag.Value ?? "";
    }
  }
  return record;
}

function definedStrings(values: Array<string | undefined>): string[] {
  return values.filter((v): v is string => typeof v === "string" && v.length > 0);
}

function toIso(date?: Date): string | undefined {
  return date ? date.toISOString() : undefined;
}

function toBackupType(snapshotType: string | undefined, queried: BackupType): BackupType {
  if (snapshotType === "manual" || snapshotType === "automated") return snapshotType;
  return queried;
}

/**
 * Groups named by the rules of `group` that can be described from the
 * same account and VPC. Pairs naming another account or a peered VPC
 * are left out.
 */
function referencedGroupIds(group: SecurityGroup, permissions: IpPermission[]): string[] {
  const ids = new Set<string>();
  for (const permission of permissions) {
    for (const pair of permission.UserIdGroupPairs ?? []) {
      if (!pair.GroupId || pair.GroupId === group.GroupId) continue;
      if (pair.UserId && group.OwnerId && pair.UserId !== group.OwnerId) continue;
      if (pair.VpcPeeringConnectionId || (pair.VpcId && group.VpcId && pair.VpcId !== group.VpcId)) continue;
      ids.add(pair.GroupId);
    }
  }
  return [...ids].sort();
}

/**
 * Pick the exact match from a describe response; providers may return
 * case-folded or prefix matches
 */
function exactMatch<T>(
  items: T[] | undefined,
  identifier: string,
  idOf: (item: T) => string | undefined,
  label: string,
): T {
  if (!items) {
    throw new ProviderError("Malformed", `${label}: response carried no result list`);
  }
  const match = items.find((item) => idOf(item) === identifier);
  if (!match) {
    throw new ProviderError("NotFound", `${label}: '${identifier}' not found`);
  }
  return match;
}

// ============================================================================
// AWS Provider Gateway
// ============================================================================

export class AwsProviderGateway implements ProviderGateway {
  readonly region: string;
  private rds: RDSClient;
  private ec2: EC2Client;
  private logger: DiscoveryLogger;
  private retry: ReturnType<typeof createProviderRetryRunner>;

  constructor(config: AwsGatewayConfig) {
    this.region = config.region;
    this.logger = config.logger ?? silentLogger;
    this.rds = new RDSClient({ region: config.region, credentials: config.credentials });
    this.ec2 = new EC2Client({ region: config.region, credentials: config.credentials });
    this.retry = createProviderRetryRunner({
      retry: config.retry,
      onRetry: (info) => {
        this.logger.warn(`${info.label ?? "operation"} failed, retry ${info.attempt}/${info.maxAttempts} in ${info.delayMs}ms`, {
          error: info.err instanceof Error ? info.err.name : String(info.err),
        });
      },
    });
  }

  // --------------------------------------------------------------------------
  // Call Helper
  // --------------------------------------------------------------------------

  private async call<T>(label: string, fn: (send: SendOptions) => Promise<T>, options?: CallOptions): Promise<T> {
    const signal = options?.signal;
    if (signal?.aborted) {
      throw new DiscoveryTimeoutError(`${label}: run aborted before the request was sent`);
    }
    try {
      return await this.retry(() => fn({ abortSignal: signal }), label, signal);
    } catch (err) {
      if (signal?.aborted) {
        throw new DiscoveryTimeoutError(`${label}: request abandoned after the run was aborted`);
      }
      throw toProviderError(err, label);
    }
  }

  // --------------------------------------------------------------------------
  // Primary Resources
  // --------------------------------------------------------------------------

  async describePrimary(identifier: string, kind: ResourceKind, options?: CallOptions): Promise<PrimaryResource> {
    if (kind === "cluster") {
      const response = await this.call(
        "DescribeDBClusters",
        (send) => this.rds.send(new DescribeDBClustersCommand({ DBClusterIdentifier: identifier }), send),
        options,
      );
      const cluster = exactMatch(response.DBClusters, identifier, (c) => c.DBClusterIdentifier, "DescribeDBClusters");
      return this.mapDBCluster(identifier, cluster);
    }

    const response = await this.call(
      "DescribeDBInstances",
      (send) => this.rds.send(new DescribeDBInstancesCommand({ DBInstanceIdentifier: identifier }), send),
      options,
    );
    const instance = exactMatch(response.DBInstances, identifier, (i) => i.DBInstanceIdentifier, "DescribeDBInstances");
    return this.mapDBInstance(identifier, instance);
  }

  private mapDBInstance(identifier: string, instance: DBInstance): PrimaryResource {
    const partial = !instance.Engine || !instance.DBInstanceStatus || !instance.EngineVersion;
    return {
      identifier,
      kind: "instance",
      arn: instance.DBInstanceArn,
      engine: instance.Engine ?? "",
      engineVersion: instance.EngineVersion ?? "",
      status: instance.DBInstanceStatus ?? "",
      instanceClass: instance.DBInstanceClass,
      storageType: instance.StorageType,
      allocatedStorageGb: instance.AllocatedStorage ?? 0,
      encrypted: instance.StorageEncrypted ?? false,
      multiAz: instance.MultiAZ ?? false,
      availabilityZones: definedStrings([instance.AvailabilityZone, instance.SecondaryAvailabilityZone]),
      vpcId: instance.DBSubnetGroup?.VpcId,
      endpoint: instance.Endpoint?.Address
        ? { address: instance.Endpoint.Address, port: instance.Endpoint.Port }
        : undefined,
      clusterIdentifier: instance.DBClusterIdentifier,
      createdAt: toIso(instance.InstanceCreateTime),
      tags: tagsToRecord(instance.TagList),
      references: {
        securityGroupIds: instance.VpcSecurityGroups
          ? definedStrings(instance.VpcSecurityGroups.map((sg) => sg.VpcSecurityGroupId))
          : undefined,
        subnetGroupName: instance.DBSubnetGroup?.DBSubnetGroupName,
        parameterGroupNames: instance.DBParameterGroups
          ? definedStrings(instance.DBParameterGroups.map((pg) => pg.DBParameterGroupName))
          : undefined,
        optionGroupNames: instance.OptionGroupMemberships
          ? definedStrings(instance.OptionGroupMemberships.map((og) => og.OptionGroupName))
          : undefined,
      },
      partial,
    };
  }

  private mapDBCluster(identifier: string, cluster: DBCluster): PrimaryResource {
    const partial = !cluster.Engine || !cluster.Status || !cluster.EngineVersion;
    return {
      identifier,
      kind: "cluster",
      arn: cluster.DBClusterArn,
      engine: cluster.Engine ?? "",
      engineVersion: cluster.EngineVersion ?? "",
      status: cluster.Status ?? "",
      instanceClass: cluster.DBClusterInstanceClass,
      storageType: cluster.StorageType,
      allocatedStorageGb: cluster.AllocatedStorage ?? 0,
      encrypted: cluster.StorageEncrypted ?? false,
      multiAz: cluster.MultiAZ ?? false,
      availabilityZones: definedStrings(cluster.AvailabilityZones ?? []),
      endpoint: cluster.Endpoint ? { address: cluster.Endpoint, port: cluster.Port } : undefined,
      readerEndpoint: cluster.ReaderEndpoint,
      createdAt: toIso(cluster.ClusterCreateTime),
      tags: tagsToRecord(cluster.TagList),
      references: {
        securityGroupIds: cluster.VpcSecurityGroups
          ? definedStrings(cluster.VpcSecurityGroups.map((sg) => sg.VpcSecurityGroupId))
          : undefined,
        subnetGroupName: cluster.DBSubnetGroup,
        clusterParameterGroupName: cluster.DBClusterParameterGroup,
        optionGroupNames: cluster.DBClusterOptionGroupMemberships
          ? definedStrings(cluster.DBClusterOptionGroupMemberships.map((og) => og.DBClusterOptionGroupName))
          : undefined,
        members: cluster.DBClusterMembers
          ? cluster.DBClusterMembers.flatMap((member) =>
              member.DBInstanceIdentifier
                ? [
                    {
                      instanceIdentifier: member.DBInstanceIdentifier,
                      isWriter: member.IsClusterWriter ?? false,
                      promotionTier: member.PromotionTier,
                    },
                  ]
                : [],
            )
          : undefined,
      },
      partial,
    };
  }

  // --------------------------------------------------------------------------
  // Secondary Resources
  // --------------------------------------------------------------------------

  async describeSecondary(
    category: SecondaryCategory,
    identifier: string,
    options?: CallOptions,
  ): Promise<SecondaryDescriptor> {
    switch (category) {
      case "securityGroups":
        return this.describeSecurityGroup(identifier, options);
      case "subnetGroups":
        return this.describeSubnetGroup(identifier, options);
      case "parameterGroups":
        return this.describeParameterGroup(identifier, options);
      case "clusterParameterGroups":
        return this.describeClusterParameterGroup(identifier, options);
      case "optionGroups":
        return this.describeOptionGroup(identifier, options);
    }
  }

  private async describeSecurityGroup(identifier: string, options?: CallOptions): Promise<SecondaryDescriptor> {
    const response = await this.call(
      "DescribeSecurityGroups",
      (send) => this.ec2.send(new DescribeSecurityGroupsCommand({ GroupIds: [identifier] }), send),
      options,
    );
    const group = exactMatch(response.SecurityGroups, identifier, (g) => g.GroupId, "DescribeSecurityGroups");
    const inbound = group.IpPermissions ?? [];
    const outbound = group.IpPermissionsEgress ?? [];

    return {
      category: "securityGroups",
      identifier,
      name: group.GroupName ?? identifier,
      metadata: {
        description: group.Description,
        vpcId: group.VpcId,
        ownerId: group.OwnerId,
        inboundRules: inbound.length,
        outboundRules: outbound.length,
      },
      tags: tagsToRecord(group.Tags),
      referencedGroupIds: referencedGroupIds(group, [...inbound, ...outbound]),
      partial: !group.GroupName,
    };
  }

  private async describeSubnetGroup(identifier: string, options?: CallOptions): Promise<SecondaryDescriptor> {
    const response = await this.call(
      "DescribeDBSubnetGroups",
      (send) => this.rds.send(new DescribeDBSubnetGroupsCommand({ DBSubnetGroupName: identifier }), send),
      options,
    );
    const group = exactMatch(response.DBSubnetGroups, identifier, (g) => g.DBSubnetGroupName, "DescribeDBSubnetGroups");
    const subnets = group.Subnets ?? [];

    return {
      category: "subnetGroups",
      identifier,
      name: identifier,
      arn: group.DBSubnetGroupArn,
      metadata: {
        description: group.DBSubnetGroupDescription,
        vpcId: group.VpcId,
        status: group.SubnetGroupStatus,
        subnets: definedStrings(subnets.map((s) => s.SubnetIdentifier)),
        availabilityZones: [...new Set(definedStrings(subnets.map((s) => s.SubnetAvailabilityZone?.Name)))].sort(),
      },
      tags: {},
      partial: !group.VpcId,
    };
  }

  private async describeParameterGroup(identifier: string, options?: CallOptions): Promise<SecondaryDescriptor> {
    const response = await this.call(
      "DescribeDBParameterGroups",
      (send) => this.rds.send(new DescribeDBParameterGroupsCommand({ DBParameterGroupName: identifier }), send),
      options,
    );
    const group = exactMatch(
      response.DBParameterGroups,
      identifier,
      (g) => g.DBParameterGroupName,
      "DescribeDBParameterGroups",
    );

    return {
      category: "parameterGroups",
      identifier,
      name: identifier,
      arn: group.DBParameterGroupArn,
      metadata: {
        family: group.DBParameterGroupFamily,
        description: group.Description,
      },
      tags: {},
      partial: !group.DBParameterGroupFamily,
    };
  }

  private async describeClusterParameterGroup(
    identifier: string,
    options?: CallOptions,
  ): Promise<SecondaryDescriptor> {
    const response = await this.call(
      "DescribeDBClusterParameterGroups",
      (send) =>
        this.rds.send(new DescribeDBClusterParameterGroupsCommand({ DBClusterParameterGroupName: identifier }), send),
      options,
    );
    const group = exactMatch(
      response.DBClusterParameterGroups,
      identifier,
      (g) => g.DBClusterParameterGroupName,
      "DescribeDBClusterParameterGroups",
    );

    return {
      category: "clusterParameterGroups",
      identifier,
      name: identifier,
      arn: group.DBClusterParameterGroupArn,
      metadata: {
        family: group.DBParameterGroupFamily,
        description: group.Description,
      },
      tags: {},
      partial: !group.DBParameterGroupFamily,
    };
  }

  private async describeOptionGroup(identifier: string, options?: CallOptions): Promise<SecondaryDescriptor> {
    const response = await this.call(
      "DescribeOptionGroups",
      (send) => this.rds.send(new DescribeOptionGroupsCommand({ OptionGroupName: identifier }), send),
      options,
    );
    const group = exactMatch(response.OptionGroupsList, identifier, (g) => g.OptionGroupName, "DescribeOptionGroups");

    return {
      category: "optionGroups",
      identifier,
      name: identifier,
      arn: group.OptionGroupArn,
      metadata: {
        description: group.OptionGroupDescription,
        engineName: group.EngineName,
        majorEngineVersion: group.MajorEngineVersion,
        vpcId: group.VpcId,
        options: definedStrings((group.Options ?? []).map((o) => o.OptionName)),
      },
      tags: {},
      partial: !group.EngineName,
    };
  }

  // --------------------------------------------------------------------------
  // Backups
  // --------------------------------------------------------------------------

  async listBackups(
    ownerIdentifier: string,
    kind: ResourceKind,
    backupType: BackupType,
    options?: CallOptions,
  ): Promise<BackupListing> {
    return kind === "cluster"
      ? this.listClusterSnapshots(ownerIdentifier, backupType, options)
      : this.listInstanceSnapshots(ownerIdentifier, backupType, options);
  }

  private async listInstanceSnapshots(
    ownerIdentifier: string,
    backupType: BackupType,
    options?: CallOptions,
  ): Promise<BackupListing> {
    const artifacts: BackupArtifact[] = [];
    let malformed = 0;
    let marker: string | undefined;

    do {
      const command = new DescribeDBSnapshotsCommand({
        DBInstanceIdentifier: ownerIdentifier,
        SnapshotType: backupType,
        MaxRecords: 100,
        Marker: marker,
      });
      const response = await this.call("DescribeDBSnapshots", (send) => this.rds.send(command, send), options);
      if (!response.DBSnapshots) {
        throw new ProviderError("Malformed", "DescribeDBSnapshots: response carried no result list");
      }

      for (const snapshot of response.DBSnapshots) {
        const artifact = this.mapDBSnapshot(snapshot, backupType);
        if (artifact) {
          artifacts.push(artifact);
        } else {
          malformed += 1;
        }
      }

      marker = response.Marker;
    } while (marker);

    if (malformed > 0) {
      this.logger.warn(`DescribeDBSnapshots: skipped ${malformed} snapshot(s) without an identifier`, {
        owner: ownerIdentifier,
        backupType,
      });
    }
    return { artifacts, malformed };
  }

  private mapDBSnapshot(snapshot: DBSnapshot, backupType: BackupType): BackupArtifact | undefined {
    if (!snapshot.DBSnapshotIdentifier) return undefined;
    return {
      category: "snapshots",
      identifier: snapshot.DBSnapshotIdentifier,
      arn: snapshot.DBSnapshotArn,
      origin: snapshot.DBInstanceIdentifier || undefined,
      type: toBackupType(snapshot.SnapshotType, backupType),
      status: snapshot.Status ?? "",
      createdAt: toIso(snapshot.SnapshotCreateTime),
      allocatedStorageGb: snapshot.AllocatedStorage ?? 0,
      encrypted: snapshot.Encrypted ?? false,
      engine: snapshot.Engine,
      engineVersion: snapshot.EngineVersion,
      tags: tagsToRecord(snapshot.TagList),
    };
  }

  private async listClusterSnapshots(
    ownerIdentifier: string,
    backupType: BackupType,
    options?: CallOptions,
  ): Promise<BackupListing> {
    const artifacts: BackupArtifact[] = [];
    let malformed = 0;
    let marker: string | undefined;

    do {
      const command = new DescribeDBClusterSnapshotsCommand({
        DBClusterIdentifier: ownerIdentifier,
        SnapshotType: backupType,
        MaxRecords: 100,
        Marker: marker,
      });
      const response = await this.call("DescribeDBClusterSnapshots", (send) => this.rds.send(command, send), options);
      if (!response.DBClusterSnapshots) {
        throw new ProviderError("Malformed", "DescribeDBClusterSnapshots: response carried no result list");
      }

      for (const snapshot of response.DBClusterSnapshots) {
        const artifact = this.mapDBClusterSnapshot(snapshot, backupType);
        if (artifact) {
          artifacts.push(artifact);
        } else {
          malformed += 1;
        }
      }

      marker = response.Marker;
    } while (marker);

    if (malformed > 0) {
      this.logger.warn(`DescribeDBClusterSnapshots: skipped ${malformed} snapshot(s) without an identifier`, {
        owner: ownerIdentifier,
        backupType,
      });
    }
    return { artifacts, malformed };
  }

  private mapDBClusterSnapshot(snapshot: DBClusterSnapshot, backupType: BackupType): BackupArtifact | undefined {
    if (!snapshot.DBClusterSnapshotIdentifier) return undefined;
    return {
      category: "clusterSnapshots",
      identifier: snapshot.DBClusterSnapshotIdentifier,
      arn: snapshot.DBClusterSnapshotArn,
      origin: snapshot.DBClusterIdentifier || undefined,
      type: toBackupType(snapshot.SnapshotType, backupType),
      status: snapshot.Status ?? "",
      createdAt: toIso(snapshot.SnapshotCreateTime),
      allocatedStorageGb: snapshot.AllocatedStorage ?? 0,
      encrypted: snapshot.StorageEncrypted ?? false,
      engine: snapshot.Engine,
      engineVersion: snapshot.EngineVersion,
      tags: tagsToRecord(snapshot.TagList),
    };
  }

  // --------------------------------------------------------------------------
  // Tags
  // --------------------------------------------------------------------------

  async listTags(resourceArn: string, options?: CallOptions): Promise<Record<string, string>> {
    const response = await this.call(
      "ListTagsForResource",
      (send) => this.rds.send(new ListTagsForResourceCommand({ ResourceName: resourceArn }), send),
      options,
    );
    return tagsToRecord(response.TagList);
  }
}

export function createAwsProviderGateway(config: AwsGatewayConfig): AwsProviderGateway {
  return new AwsProviderGateway(config);
}
