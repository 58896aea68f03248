import type { Item } from "./item.js";
import type { Tree } from "./tree.js";
import type { DocumentKind, ResultMapping, TestResultRecord } from "./types.js";

export interface TraceabilityRow {
  useCase: Item | null;
  requirement: Item | null;
  test: Item | null;
  results: TestResultRecord[];
}

export interface MatrixOptions {
  /**
   * Also emit requirements that trace to no use case (under a null use case)
   * and tests that no requirement reaches (under a null requirement).
   */
  includeUnlinked?: boolean;
}

const ROOT_KINDS: ReadonlySet<DocumentKind> = new Set<DocumentKind>(["use-case", "risk"]);

/**
 * Walks use case -> requirement -> test, one hop at a time, through the
 * tree's child view. Any other link shape is ignored, and heading items
 * never appear. Rows follow document then item order at every level, so
 * identical trees give identical rows.
 */
export function buildTraceabilityMatrix(
  tree: Tree,
  results: ResultMapping = {},
  options: MatrixOptions = {}
): TraceabilityRow[] {
  const rows: TraceabilityRow[] = [];
  const items = tree.items().filter((item) => item.active);
  const isRoot = (item: Item) => ROOT_KINDS.has(tree.kindOf(item));
  const childrenOfKind = (item: Item, kind: DocumentKind) =>
    tree.getChildren(item).filter((child) => child.active && tree.kindOf(child) === kind);
  const resultsFor = (test: Item): TestResultRecord[] =>
    Object.hasOwn(results, test.id) ? results[test.id].map((record) => ({ ...record })) : [];

  const emitRequirement = (useCase: Item | null, requirement: Item) => {
    const tests = childrenOfKind(requirement, "test");
    if (tests.length === 0) {
      rows.push({ useCase, requirement, test: null, results: [] });
      return;
    }
    for (const test of tests) {
      rows.push({ useCase, requirement, test, results: resultsFor(test) });
    }
  };

  for (const useCase of items.filter(isRoot)) {
    const requirements = childrenOfKind(useCase, "requirement");
    if (requirements.length === 0) {
      rows.push({ useCase, requirement: null, test: null, results: [] });
      continue;
    }
    for (const requirement of requirements) {
      emitRequirement(useCase, requirement);
    }
  }

  if (options.includeUnlinked) {
    for (const requirement of items) {
      if (tree.kindOf(requirement) !== "requirement") continue;
      const traced = tree.getParents(requirement).some((parent) => parent.active && isRoot(parent));
      if (!traced) {
        emitRequirement(null, requirement);
      }
    }
    const reached = new Set(rows.flatMap((row) => (row.test ? [row.test.id] : [])));
    for (const test of items) {
      if (tree.kindOf(test) !== "test" || reached.has(test.id)) continue;
      rows.push({ useCase: null, requirement: null, test, results: resultsFor(test) });
    }
  }

  return rows;
}
