/**
 * Reference extraction: pure mapping from a primary descriptor to the
 * secondary resources and cluster members it points at.
 */

import {
  CATEGORY_ORDER,
  type ClusterMemberRef,
  type EmbeddedReferences,
  type PrimaryResource,
  type ResourceReference,
  type SecondaryCategory,
} from "../types.js";

export type MalformedCategory = SecondaryCategory | "clusterMembers";

export type ExtractedReferences = {
  references: ResourceReference[];
  members: ClusterMemberRef[];
  /** Required fields the descriptor did not carry */
  malformed: MalformedCategory[];
};

type FieldSpec = {
  category: SecondaryCategory;
  read: (refs: EmbeddedReferences) => string[] | undefined;
  required: boolean;
};

const single = (value: string | undefined): string[] | undefined => (value === undefined ? undefined : [value]);

const INSTANCE_FIELDS: FieldSpec[] = [
  { category: "securityGroups", read: (r) => r.securityGroupIds, required: true },
  { category: "subnetGroups", read: (r) => single(r.subnetGroupName), required: true },
  { category: "parameterGroups", read: (r) => r.parameterGroupNames, required: true },
  { category: "optionGroups", read: (r) => r.optionGroupNames, required: true },
];

// Option groups are an optional cluster attribute (Aurora MySQL only)
const CLUSTER_FIELDS: FieldSpec[] = [
  { category: "securityGroups", read: (r) => r.securityGroupIds, required: true },
  { category: "subnetGroups", read: (r) => single(r.subnetGroupName), required: true },
  { category: "clusterParameterGroups", read: (r) => single(r.clusterParameterGroupName), required: true },
  { category: "optionGroups", read: (r) => r.optionGroupNames, required: false },
];

export function compareReferences(a: ResourceReference, b: ResourceReference): number {
  const byCategory = CATEGORY_ORDER.indexOf(a.category) - CATEGORY_ORDER.indexOf(b.category);
  if (byCategory !== 0) return byCategory;
  return a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0;
}

export function extractReferences(primary: PrimaryResource): ExtractedReferences {
  const fields = primary.kind === "cluster" ? CLUSTER_FIELDS : INSTANCE_FIELDS;
  const seen = new Set<string>();
  const references: ResourceReference[] = [];
  const malformed: MalformedCategory[] = [];

  for (const field of fields) {
    const values = field.read(primary.references);
    if (values === undefined) {
      if (field.required) malformed.push(field.category);
      continue;
    }
    for (const raw of values) {
      const identifier = raw.trim();
      if (!identifier) continue;
      const key = `${field.category}:${identifier}`;
      if (seen.has(key)) continue;
      seen.add(key);
      references.push({ category: field.category, identifier });
    }
  }

  const members: ClusterMemberRef[] = [];
  if (primary.kind === "cluster") {
    if (primary.references.members === undefined) {
      malformed.push("clusterMembers");
    } else {
      const memberIds = new Set<string>();
      for (const member of primary.references.members) {
        if (memberIds.has(member.instanceIdentifier)) continue;
        memberIds.add(member.instanceIdentifier);
        members.push(member);
      }
      members.sort((a, b) => (a.instanceIdentifier < b.instanceIdentifier ? -1 : 1));
    }
  }

  return { references: references.sort(compareReferences), members, malformed };
}
