import { afterEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_SETTINGS, classifyPrefix, parseSettings } from "../src/settings.js";
import { Tree } from "../src/tree.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseSettings", () => {
  it("fills defaults around the provided values", () => {
    const settings = parseSettings("prefixes:\n  test: [HLTC, LLTC]\nitems:\n  sep: \"-\"\n");

    expect(settings.prefixes).toEqual({
      useCase: ["USECASE"],
      test: ["HLTC", "LLTC"],
      role: ["ROLE"],
      risk: ["RISK"],
      heading: ["HEAD"],
    });
    expect(settings.items).toEqual({ digits: 3, sep: "-" });
    expect(settings.checkSuspectLinks).toBe(true);
  });

  it("treats an empty file as defaults", () => {
    expect(parseSettings("")).toEqual(DEFAULT_SETTINGS);
  });

  it("warns and falls back to defaults on invalid settings", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(parseSettings("items:\n  digits: zero\n")).toEqual(DEFAULT_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^\[tracegraph:settings\] Unable to parse settings/);
  });
});

describe("classifyPrefix", () => {
  it("checks use case, test, role, risk and heading families in that order", () => {
    expect(classifyPrefix("USECASE")).toBe("use-case");
    expect(classifyPrefix("test")).toBe("test");
    expect(classifyPrefix("ROLES")).toBe("role");
    expect(classifyPrefix("RISK")).toBe("risk");
    expect(classifyPrefix("HEAD")).toBe("heading");
    expect(classifyPrefix("SYS")).toBe("requirement");
  });

  it("drives item numbering and kinds through the tree", () => {
    const tree = Tree.fromRecords([{ prefix: "HLTC", items: [] }], {
      settings: { prefixes: { test: ["HLTC"] }, items: { digits: 2, sep: "-" } },
    });

    expect(tree.findDocument("HLTC").kind).toBe("test");
    expect(tree.addItem("HLTC").id).toBe("HLTC-01");
  });
});
