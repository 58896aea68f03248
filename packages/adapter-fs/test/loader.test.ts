import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { buildTraceabilityMatrix, rpn } from "@tracegraph/core";

import {
  RecordSourceError,
  loadDocumentRecord,
  loadResultsFromFs,
  loadSettingsFromFs,
  loadTreeFromFs,
} from "../src/index.js";

const tempDirs: string[] = [];

async function writeFiles(files: Record<string, string>): Promise<string> {
  const rootDir = await mkdtemp(path.join(tmpdir(), "tracegraph-fs-"));
  tempDirs.push(rootDir);
  for (const [relativePath, contents] of Object.entries(files)) {
    const target = path.join(rootDir, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, contents, "utf8");
  }
  return rootDir;
}

const PROJECT: Record<string, string> = {
  "reqs/usecase/.tracegraph.yml": "settings:\n  prefix: USECASE\n  parent: null\n  name: Use cases\n",
  "reqs/usecase/USECASE001.yml": "active: true\ntext: |\n  Operator exports a report\nlinks: []\n",
  "reqs/srd/.tracegraph.yml": "settings:\n  prefix: SRD\n  parent: USECASE\n  level: 2\n",
  "reqs/srd/SRD001.yml": "text: Export writes CSV\nlinks:\n- USECASE001\nprio: 1\njira: [42, OPS-7]\n",
  "reqs/srd/notes.yml": "text: scratch\n",
  "tests/.tracegraph.yml": "settings:\n  prefix: TEST\n  parent: SRD\n",
  "tests/TEST001.yml": "text: CSV is written\nlinks:\n- SRD001: stale\n",
};

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("loadTreeFromFs", () => {
  it("loads documents in path order and their items by file name", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rootDir = await writeFiles(PROJECT);

    const tree = await loadTreeFromFs(rootDir);

    expect(tree.state).toBe("loaded");
    expect(tree.documents.map((document) => document.prefix)).toEqual(["SRD", "USECASE", "TEST"]);
    expect(tree.findDocument("SRD").parent).toBe("USECASE");
    expect(tree.findDocument("SRD").level).toBe("2");
    expect(tree.findDocument("USECASE").name).toBe("Use cases");
    expect(tree.items().map((item) => item.id)).toEqual(["SRD001", "USECASE001", "TEST001"]);
    expect(tree.findItem("SRD001").jira).toEqual(["42", "OPS-7"]);
    expect(tree.findItem("SRD001").prio).toBe(1);
    expect(warn).toHaveBeenCalledWith(
      `[adapter-fs] Skipping ${path.join(rootDir, "reqs/srd", "notes.yml")}: file name is not an item id`
    );
  });

  it("stamps bare links and keeps stored fingerprints for review", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const tree = await loadTreeFromFs(await writeFiles(PROJECT));

    const requirement = tree.findItem("SRD001");
    expect(requirement.linkFingerprint("USECASE001")).toBe(tree.findItem("USECASE001").fingerprint);
    expect(tree.findItem("TEST001").linkFingerprint("SRD001")).toBe("stale");

    expect(tree.validate()).toEqual([
      {
        kind: "suspect-link",
        severity: "info",
        itemId: "TEST001",
        targetId: "SRD001",
        detail: "SRD001 changed since the link was made",
      },
    ]);
  });

  it("feeds the traceability matrix", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rootDir = await writeFiles({
      ...PROJECT,
      "results.yml": "TEST001:\n- function: test_csv\n  result_file: run-1.xml\n  status: passed\n",
    });
    const tree = await loadTreeFromFs(rootDir);
    const results = await loadResultsFromFs(path.join(rootDir, "results.yml"));

    const rows = buildTraceabilityMatrix(tree, results);

    expect(rows.map((row) => [row.useCase?.id, row.requirement?.id, row.test?.id])).toEqual([
      ["USECASE001", "SRD001", "TEST001"],
    ]);
    expect(rows[0].results).toEqual([{ function: "test_csv", result_file: "run-1.xml", status: "passed" }]);
  });

  it("applies the project settings file", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rootDir = await writeFiles({ ...PROJECT, "tracegraph.config.yaml": "checkSuspectLinks: false\n" });

    const tree = await loadTreeFromFs(rootDir);

    expect(tree.settings.checkSuspectLinks).toBe(false);
    expect(tree.validate()).toEqual([]);
  });

  it("reports the offending file for invalid item fields", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rootDir = await writeFiles({ ...PROJECT, "tests/TEST002.yml": "active: \"yes\"\ntext: broken\n" });

    const loading = loadTreeFromFs(rootDir);

    await expect(loading).rejects.toBeInstanceOf(RecordSourceError);
    await expect(loading).rejects.toThrow(
      `${path.join(rootDir, "tests", "TEST002.yml")}: active Expected boolean, received string`
    );
  });

  it("reports item files placed in another document's directory", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rootDir = await writeFiles({ ...PROJECT, "reqs/srd/TEST002.yml": "text: misplaced\n" });

    const loading = loadTreeFromFs(rootDir);

    await expect(loading).rejects.toBeInstanceOf(RecordSourceError);
    await expect(loading).rejects.toThrow(
      `${path.join(rootDir, "reqs/srd", "TEST002.yml")}: item TEST002 does not belong to document SRD`
    );
  });

  it("reads risk ratings before and after mitigation", async () => {
    const rootDir = await writeFiles({
      "risks/.tracegraph.yml": "settings:\n  prefix: RISK\n",
      "risks/RISK001.yml": [
        "text: Export leaks data",
        "risk-rating:",
        "  detectability: 3",
        "  probability: 4",
        "  severity: 5",
        "residual-risk-rating:",
        "  detectability: 3",
        "  severity: 5",
        "",
      ].join("\n"),
    });

    const tree = await loadTreeFromFs(rootDir);
    const risk = tree.findItem("RISK001");

    expect(risk.riskRating).toEqual({ detectability: 3, probability: 4, severity: 5 });
    expect(rpn(risk.riskRating)).toBe(60);
    expect(rpn(risk.residualRiskRating)).toBeNull();
  });

  it("reports malformed YAML", async () => {
    const rootDir = await writeFiles({ "srd/.tracegraph.yml": "settings: [unclosed\n" });

    await expect(loadDocumentRecord(path.join(rootDir, "srd", ".tracegraph.yml"))).rejects.toThrow(/invalid YAML/);
  });
});

describe("loadSettingsFromFs", () => {
  it("uses defaults when the project has no settings file", async () => {
    const settings = await loadSettingsFromFs(await writeFiles({}));

    expect(settings.checkSuspectLinks).toBe(true);
    expect(settings.items).toEqual({ digits: 3, sep: "" });
  });
});

describe("loadResultsFromFs", () => {
  it("returns an empty mapping with a warning when the file is missing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rootDir = await writeFiles({});
    const resultFile = path.join(rootDir, "results.yml");

    expect(await loadResultsFromFs(resultFile)).toEqual({});
    expect(warn).toHaveBeenCalledWith(
      `[adapter-fs] No result file at ${resultFile}; matrix rows will carry no results`
    );
  });

  it("rejects records without the required fields", async () => {
    const rootDir = await writeFiles({ "results.yml": "TEST001:\n- function: test_csv\n" });

    await expect(loadResultsFromFs(path.join(rootDir, "results.yml"))).rejects.toThrow(/invalid result mapping/);
  });
});
