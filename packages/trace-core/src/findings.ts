import type { Finding, FindingKind } from "./types.js";

export type FindingSummary = Record<FindingKind, number>;

export function summarizeFindings(findings: Finding[]): FindingSummary {
  const summary: FindingSummary = { "unresolved-link": 0, "suspect-link": 0, "bad-stakeholder": 0 };
  for (const finding of findings) {
    summary[finding.kind] += 1;
  }
  return summary;
}

/** Strict pipelines fail on referential findings; suspect links never count. */
export function hasErrors(findings: Finding[]): boolean {
  return findings.some((finding) => finding.severity === "error");
}

export function formatFinding(finding: Finding): string {
  return `${finding.severity.toUpperCase()} ${finding.itemId} -> ${finding.targetId} [${finding.kind}]: ${finding.detail}`;
}
