import { z } from "zod";

import type { ResultCount, ResultMapping, TestResultRecord } from "./types.js";

export const TestResultRecordSchema = z
  .object({
    function: z.string(),
    result_file: z.string(),
    status: z.string(),
  })
  .passthrough();

export const ResultMappingSchema = z.record(z.string(), z.array(TestResultRecordSchema));

export function parseResultMapping(value: unknown): ResultMapping {
  const parsed = ResultMappingSchema.parse(value ?? {});
  const mapping: ResultMapping = {};
  for (const [testId, records] of Object.entries(parsed)) {
    mapping[testId] = records.map((record) => ({
      function: record.function,
      result_file: record.result_file,
      status: record.status,
    }));
  }
  return mapping;
}

/** Run counts per status, sorted by status name. */
export function summarizeResults(records: TestResultRecord[]): ResultCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.status, (counts.get(record.status) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([status, count]) => ({ status, count }));
}
