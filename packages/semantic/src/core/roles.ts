import type { RelationKind, UsageKeyword } from "@syslens/syntax";

import type { SemanticRole } from "./model.js";

const ROLE_BY_KEYWORD: Record<UsageKeyword, SemanticRole> = {
  part: "Component",
  attribute: "Attribute",
  item: "Item",
  port: "Port",
  action: "Action",
  state: "State",
  requirement: "Requirement",
  constraint: "Constraint",
  connection: "Connection",
  interface: "Interface",
  allocation: "Allocation",
  view: "View",
  viewpoint: "View",
  rendering: "View",
  enum: "Enumeration",
  occurrence: "Occurrence",
  calc: "Calculation",
  case: "UseCase",
  "use case": "UseCase",
  "analysis case": "AnalysisCase",
  "verification case": "VerificationCase",
  concern: "Requirement",
  flow: "Flow",
  metadata: "Metadata",
  ref: "Reference",
  subject: "Reference",
  actor: "Reference",
  stakeholder: "Reference",
  objective: "Requirement",
  snapshot: "Occurrence",
  timeslice: "Occurrence",
  event: "Occurrence",
  satisfy: "Requirement",
  perform: "Action",
  exhibit: "State",
  include: "UseCase",
};

export function roleOf(keyword: UsageKeyword): SemanticRole {
  return ROLE_BY_KEYWORD[keyword];
}

/** Role a relationship's target must play, for the kinds that constrain it. */
export const REQUIRED_TARGET_ROLE: Partial<Record<RelationKind, SemanticRole>> = {
  satisfaction: "Requirement",
  performance: "Action",
  exhibition: "State",
  inclusion: "UseCase",
};

const ROLE_LABEL: Record<SemanticRole, string> = {
  Requirement: "requirement",
  Action: "action",
  State: "state",
  UseCase: "use case",
  Component: "component",
  Interface: "interface",
  Port: "port",
  Attribute: "attribute",
  Connection: "connection",
  Constraint: "constraint",
  AnalysisCase: "analysis case",
  VerificationCase: "verification case",
  View: "view",
  Metadata: "metadata",
  Item: "item",
  Flow: "flow",
  Allocation: "allocation",
  Occurrence: "occurrence",
  Calculation: "calculation",
  Enumeration: "enumeration",
  Reference: "reference",
};

export function roleLabel(role: SemanticRole): string {
  return ROLE_LABEL[role];
}

export function withArticle(label: string): string {
  return /^[aeio]/.test(label) ? `an ${label}` : `a ${label}`;
}
