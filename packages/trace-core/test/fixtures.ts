import type { DocumentRecord } from "../src/types.js";
import type { TraceabilityRow } from "../src/matrix.js";

/**
 * USECASE (root) <- SRD <- TEST, plus a separate ROLE root.
 * USECASE002 has no requirements and SRD002 has no tests.
 */
export function sampleRecords(): DocumentRecord[] {
  return [
    {
      prefix: "USECASE",
      name: "Use cases",
      items: [
        { id: "USECASE001", text: "Operator exports a report", stakeholder: "ROLE001" },
        { id: "USECASE002", text: "Operator archives old reports" },
      ],
    },
    {
      prefix: "ROLE",
      items: [{ id: "ROLE001", text: "Operator" }],
    },
    {
      prefix: "SRD",
      parent: "USECASE",
      items: [
        { id: "SRD001", text: "Export writes one CSV line per item", links: ["USECASE001"], implemented: true },
        { id: "SRD002", text: "Export starts with a header line", links: ["USECASE001"], prio: 2 },
      ],
    },
    {
      prefix: "TEST",
      parent: "SRD",
      items: [
        { id: "TEST001", text: "CSV line count matches", links: ["SRD001"] },
        { id: "TEST002", text: "CSV escapes commas", links: ["SRD001"] },
      ],
    },
  ];
}

export function rowIds(rows: TraceabilityRow[]): Array<[string | null, string | null, string | null]> {
  return rows.map((row) => [row.useCase?.id ?? null, row.requirement?.id ?? null, row.test?.id ?? null]);
}
