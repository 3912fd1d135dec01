/**
 * Resource factories and canned accounts for discovery tests
 */

import type { SecondaryDescriptor } from "../gateway/provider.js";
import type { BackupArtifact, BackupType, PrimaryResource } from "../types.js";
import { FakeProviderGateway } from "./fake-gateway.js";

const ACCOUNT = "123456789012";
const REGION = "us-east-1";

export const rdsArn = (type: string, name: string) => `arn:aws:rds:${REGION}:${ACCOUNT}:${type}:${name}`;

// ── Factories ───────────────────────────────────────────────────────────────

export function makeInstance(identifier: string, overrides: Partial<PrimaryResource> = {}): PrimaryResource {
  return {
    identifier,
    kind: "instance",
    arn: rdsArn("db", identifier),
    engine: "mysql",
    engineVersion: "8.0.35",
    status: "available",
    instanceClass: "db.t3.medium",
    storageType: "gp3",
    allocatedStorageGb: 100,
    encrypted: true,
    multiAz: false,
    availabilityZones: ["us-east-1a"],
    vpcId: "vpc-0123",
    endpoint: { address: `${identifier}.abc.us-east-1.rds.amazonaws.com`, port: 3306 },
    tags: { env: "test" },
    references: {
      securityGroupIds: [],
      subnetGroupName: "default-subnets",
      parameterGroupNames: ["default.mysql8.0"],
      optionGroupNames: ["default:mysql-8-0"],
    },
    partial: false,
    ...overrides,
  };
}

export function makeCluster(identifier: string, overrides: Partial<PrimaryResource> = {}): PrimaryResource {
  return {
    identifier,
    kind: "cluster",
    arn: rdsArn("cluster", identifier),
    engine: "aurora-mysql",
    engineVersion: "8.0.mysql_aurora.3.05.2",
    status: "available",
    allocatedStorageGb: 1,
    encrypted: true,
    multiAz: true,
    availabilityZones: ["us-east-1a", "us-east-1b", "us-east-1c"],
    endpoint: { address: `${identifier}.cluster-abc.us-east-1.rds.amazonaws.com`, port: 3306 },
    readerEndpoint: `${identifier}.cluster-ro-abc.us-east-1.rds.amazonaws.com`,
    tags: { env: "prod" },
    references: {
      securityGroupIds: [],
      subnetGroupName: "default-subnets",
      clusterParameterGroupName: "default.aurora-mysql8.0",
      members: [],
    },
    partial: false,
    ...overrides,
  };
}

export function makeSecurityGroup(identifier: string, referencedGroupIds: string[] = []): SecondaryDescriptor {
  return {
    category: "securityGroups",
    identifier,
    name: `${identifier}-name`,
    metadata: { vpcId: "vpc-0123", inboundRules: 1, outboundRules: 1 },
    tags: { team: "data" },
    referencedGroupIds,
    partial: false,
  };
}

export function makeSubnetGroup(identifier: string): SecondaryDescriptor {
  return {
    category: "subnetGroups",
    identifier,
    name: identifier,
    arn: rdsArn("subgrp", identifier),
    metadata: { vpcId: "vpc-0123", subnets: ["subnet-a", "subnet-b"] },
    tags: {},
    partial: false,
  };
}

export function makeParameterGroup(identifier: string): SecondaryDescriptor {
  return {
    category: "parameterGroups",
    identifier,
    name: identifier,
    arn: rdsArn("pg", identifier),
    metadata: { family: "mysql8.0" },
    tags: {},
    partial: false,
  };
}

export function makeClusterParameterGroup(identifier: string): SecondaryDescriptor {
  return {
    category: "clusterParameterGroups",
    identifier,
    name: identifier,
    arn: rdsArn("cluster-pg", identifier),
    metadata: { family: "aurora-mysql8.0" },
    tags: {},
    partial: false,
  };
}

export function makeOptionGroup(identifier: string): SecondaryDescriptor {
  return {
    category: "optionGroups",
    identifier,
    name: identifier,
    arn: rdsArn("og", identifier),
    metadata: { engineName: "mysql", majorEngineVersion: "8.0" },
    tags: {},
    partial: false,
  };
}

export function makeSnapshot(identifier: string, origin: string | undefined, type: BackupType = "manual"): BackupArtifact {
  return {
    category: "snapshots",
    identifier,
    arn: rdsArn("snapshot", identifier),
    origin,
    type,
    status: "available",
    createdAt: "2026-01-15T10:00:00.000Z",
    allocatedStorageGb: 100,
    encrypted: true,
    engine: "mysql",
    engineVersion: "8.0.35",
    tags: { backup: "yes" },
  };
}

export function makeClusterSnapshot(
  identifier: string,
  origin: string | undefined,
  type: BackupType = "manual",
): BackupArtifact {
  return {
    ...makeSnapshot(identifier, origin, type),
    category: "clusterSnapshots",
    arn: rdsArn("cluster-snapshot", identifier),
    engine: "aurora-mysql",
  };
}

// ── Canned accounts ─────────────────────────────────────────────────────────

/**
 * Instance `my-mysql-instance` with 2 manual snapshots, 2 security
 * groups and one each of subnet, parameter and option group
 */
export function singleInstanceAccount(gateway = new FakeProviderGateway()): FakeProviderGateway {
  return gateway
    .addPrimary(
      makeInstance("my-mysql-instance", {
        references: {
          securityGroupIds: ["sg-0a1", "sg-0b2"],
          subnetGroupName: "app-subnets",
          parameterGroupNames: ["mysql80-custom"],
          optionGroupNames: ["mysql80-audit"],
        },
      }),
    )
    .addSecondary(makeSecurityGroup("sg-0a1"))
    .addSecondary(makeSecurityGroup("sg-0b2"))
    .addSecondary(makeSubnetGroup("app-subnets"))
    .addSecondary(makeParameterGroup("mysql80-custom"))
    .addSecondary(makeOptionGroup("mysql80-audit"))
    .addBackup(makeSnapshot("my-mysql-instance-2026-01-01", "my-mysql-instance"))
    .addBackup(makeSnapshot("my-mysql-instance-2026-02-01", "my-mysql-instance"));
}

export const AURORA_MEMBERS = ["prod-aurora-1", "prod-aurora-2", "prod-aurora-3"];

/**
 * Cluster `prod-aurora-cluster` with 3 members, 1 cluster snapshot,
 * 1 cluster parameter group and 2 security groups
 */
export function auroraClusterAccount(gateway = new FakeProviderGateway()): FakeProviderGateway {
  gateway
    .addPrimary(
      makeCluster("prod-aurora-cluster", {
        references: {
          securityGroupIds: ["sg-aurora-app", "sg-aurora-admin"],
          subnetGroupName: "aurora-subnets",
          clusterParameterGroupName: "aurora-mysql8-cluster",
          members: AURORA_MEMBERS.map((id, index) => ({
            instanceIdentifier: id,
            isWriter: index === 0,
            promotionTier: index + 1,
          })),
        },
      }),
    )
    .addSecondary(makeSecurityGroup("sg-aurora-app"))
    .addSecondary(makeSecurityGroup("sg-aurora-admin"))
    .addSecondary(makeSubnetGroup("aurora-subnets"))
    .addSecondary(makeClusterParameterGroup("aurora-mysql8-cluster"))
    .addSecondary(makeParameterGroup("aurora-mysql8-instance"))
    .addBackup(makeClusterSnapshot("prod-aurora-cluster-2026-01-01", "prod-aurora-cluster"));

  for (const id of AURORA_MEMBERS) {
    gateway.addPrimary(
      makeInstance(id, {
        engine: "aurora-mysql",
        clusterIdentifier: "prod-aurora-cluster",
        references: {
          securityGroupIds: ["sg-aurora-app", "sg-aurora-admin"],
          subnetGroupName: "aurora-subnets",
          parameterGroupNames: ["aurora-mysql8-instance"],
          optionGroupNames: [],
        },
      }),
    );
  }
  return gateway;
}
