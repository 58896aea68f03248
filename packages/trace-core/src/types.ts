export type DocumentKind =
  | "requirement"
  | "test"
  | "use-case"
  | "role"
  | "risk"
  | "heading";

export interface LinkRecord {
  id: string;
  fingerprint?: string | null;
}

export type LinkInput = string | LinkRecord;

/** Each factor is an ordinal; a missing factor leaves the priority number undefined. */
export interface RiskRating {
  detectability?: number | null;
  probability?: number | null;
  severity?: number | null;
}

export interface ItemRecord {
  id: string;
  text?: string;
  links?: LinkInput[];
  stakeholder?: string | null;
  prio?: number | null;
  implemented?: boolean;
  jira?: string[];
  active?: boolean;
  riskRating?: RiskRating | null;
  residualRiskRating?: RiskRating | null;
}

export interface DocumentRecord {
  prefix: string;
  parent?: string | null;
  name?: string;
  level?: string;
  digits?: number;
  sep?: string;
  items?: ItemRecord[];
}

export interface ReviewableContent {
  id: string;
  text: string;
  links: string[];
}

export type TreeState =
  | "empty"
  | "loading"
  | "loaded"
  | "validating"
  | "failed"
  | "discarded";

export type FindingKind = "unresolved-link" | "suspect-link" | "bad-stakeholder";

export type FindingSeverity = "error" | "info";

export interface Finding {
  kind: FindingKind;
  severity: FindingSeverity;
  itemId: string;
  targetId: string;
  detail: string;
}

export type KnownResultStatus = "passed" | "failure" | "error" | "skipped";

export interface TestResultRecord {
  function: string;
  result_file: string;
  status: KnownResultStatus | string;
}

export type ResultMapping = Record<string, TestResultRecord[]>;

export interface ResultCount {
  status: string;
  count: number;
}
