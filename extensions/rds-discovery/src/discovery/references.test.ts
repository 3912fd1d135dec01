import { describe, it, expect } from "vitest";
import { compareReferences, extractReferences } from "./references.js";
import { makeCluster, makeInstance } from "../testing/fixtures.js";

describe("extractReferences", () => {
  it("extracts instance references in canonical order", () => {
    const primary = makeInstance("my-db", {
      references: {
        securityGroupIds: ["sg-b", "sg-a"],
        subnetGroupName: "app-subnets",
        parameterGroupNames: ["custom-pg"],
        optionGroupNames: ["custom-og"],
      },
    });

    expect(extractReferences(primary)).toEqual({
      references: [
        { category: "securityGroups", identifier: "sg-a" },
        { category: "securityGroups", identifier: "sg-b" },
        { category: "subnetGroups", identifier: "app-subnets" },
        { category: "parameterGroups", identifier: "custom-pg" },
        { category: "optionGroups", identifier: "custom-og" },
      ],
      members: [],
      malformed: [],
    });
  });

  it("deduplicates repeated references and skips blanks", () => {
    const primary = makeInstance("my-db", {
      references: {
        securityGroupIds: ["sg-a", "sg-a", " "],
        subnetGroupName: "app-subnets",
        parameterGroupNames: [],
        optionGroupNames: ["og", "og"],
      },
    });

    expect(extractReferences(primary).references).toEqual([
      { category: "securityGroups", identifier: "sg-a" },
      { category: "subnetGroups", identifier: "app-subnets" },
      { category: "optionGroups", identifier: "og" },
    ]);
  });

  it("marks missing required fields as malformed and extracts the rest", () => {
    const primary = makeInstance("my-db", {
      references: { securityGroupIds: ["sg-a"], optionGroupNames: [] },
    });

    const extracted = extractReferences(primary);

    expect(extracted.references).toEqual([{ category: "securityGroups", identifier: "sg-a" }]);
    expect(extracted.malformed).toEqual(["subnetGroups", "parameterGroups"]);
  });

  it("extracts cluster references and members separately", () => {
    const cluster = makeCluster("prod-aurora-cluster", {
      references: {
        securityGroupIds: ["sg-app"],
        subnetGroupName: "aurora-subnets",
        clusterParameterGroupName: "aurora-cluster-pg",
        members: [
          { instanceIdentifier: "prod-aurora-2", isWriter: false },
          { instanceIdentifier: "prod-aurora-1", isWriter: true },
          { instanceIdentifier: "prod-aurora-2", isWriter: false },
        ],
      },
    });

    expect(extractReferences(cluster)).toEqual({
      references: [
        { category: "securityGroups", identifier: "sg-app" },
        { category: "subnetGroups", identifier: "aurora-subnets" },
        { category: "clusterParameterGroups", identifier: "aurora-cluster-pg" },
      ],
      members: [
        { instanceIdentifier: "prod-aurora-1", isWriter: true },
        { instanceIdentifier: "prod-aurora-2", isWriter: false },
      ],
      malformed: [],
    });
  });

  it("does not require option groups on clusters but does require members", () => {
    const cluster = makeCluster("c1", {
      references: { securityGroupIds: [], subnetGroupName: "s", clusterParameterGroupName: "p" },
    });

    expect(extractReferences(cluster).malformed).toEqual(["clusterMembers"]);
  });

  it("never reports members for instances", () => {
    const primary = makeInstance("member-1", { clusterIdentifier: "c1" });
    expect(extractReferences(primary).members).toEqual([]);
  });
});

describe("compareReferences", () => {
  it("orders by category, then identifier", () => {
    const sorted = [
      { category: "optionGroups" as const, identifier: "a" },
      { category: "securityGroups" as const, identifier: "sg-2" },
      { category: "securityGroups" as const, identifier: "sg-1" },
    ].sort(compareReferences);
    expect(sorted.map((r) => r.identifier)).toEqual(["sg-1", "sg-2", "a"]);
  });
});
