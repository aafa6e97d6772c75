import { describe, expect, it } from "vitest";
import { Diagnostics } from "../../diagnostics/diagnostics.js";
import { testFramebook } from "../../__tests__/fixtures.js";
import { PatternCatalog } from "../patternCatalog.js";

describe("PatternCatalog", () => {
  it("lists categories in configuration order", () => {
    const catalog = new PatternCatalog(testFramebook(), new Diagnostics());
    expect(catalog.categories("agency")).toEqual(["ACTIVE", "PASSIVE_SUFFERING", "MORAL_REFLECTIVE"]);
  });

  it("reports a missing language once per category", () => {
    const diagnostics = new Diagnostics();
    const catalog = new PatternCatalog(testFramebook(), diagnostics);

    expect(catalog.patternsFor("frames", "VOCATION", "de")).toEqual([]);
    expect(catalog.patternsFor("frames", "VOCATION", "de")).toEqual([]);
    expect(catalog.patternsFor("frames", "FAMILY", "de")).toEqual([]);

    const entries = diagnostics.byCode("patterns_missing_for_language");
    expect(entries).toHaveLength(2);
    expect(entries[0].context).toEqual({ section: "frames", category: "VOCATION", language: "de" });
  });

  it("normalizes pronoun rules to pattern lists", () => {
    const catalog = new PatternCatalog(testFramebook(), new Diagnostics());
    expect(catalog.pronounsFor("en")).toEqual([
      { label: "SELF", patterns: ["\\bI\\b"] },
      { label: "WE", patterns: ["\\bwe\\b"] },
      { label: "THEY", patterns: ["\\bthey\\b", "\\bthem\\b"] },
    ]);
  });

  it("skips pronouns for an uncovered language with one diagnostic", () => {
    const diagnostics = new Diagnostics();
    const catalog = new PatternCatalog(testFramebook(), diagnostics);
    catalog.pronounsFor("fr");
    catalog.pronounsFor("fr");
    expect(diagnostics.byCode("pronouns_missing_for_language")).toHaveLength(1);
  });

  it("falls back to the default priority", () => {
    const catalog = new PatternCatalog(testFramebook(), new Diagnostics());
    expect(catalog.priorityOf("SYSTEM_FAILURE", 10)).toBe(30);
    expect(catalog.priorityOf("VOCATION", 10)).toBe(10);
    expect(catalog.languages()).toEqual(["en"]);
  });
});
