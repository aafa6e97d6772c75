import { describe, expect, it } from "vitest";
import {
  capabilityReport,
  CapabilityRegistry,
  createLanguageCapabilities,
  lightCapabilities,
  regexSplitSentences,
} from "../languageCapabilities.js";

describe("regexSplitSentences", () => {
  it("splits after terminal punctuation", () => {
    expect(regexSplitSentences("One. Two! Three? four")).toEqual(["One.", "Two!", "Three?", "four"]);
  });

  it("returns nothing for blank text", () => {
    expect(regexSplitSentences("   ")).toEqual([]);
  });
});

describe("language capabilities", () => {
  it("is pattern-only without optional resources", () => {
    expect(capabilityReport(lightCapabilities("de"))).toEqual({
      language: "de",
      level: "light",
      sentence_segmenter: false,
      syntax: false,
    });
  });

  it("reports full capability with a subject extractor", () => {
    const capabilities = createLanguageCapabilities("de", {
      useIntlSegmenter: false,
      subjectExtractor: () => [],
    });
    expect(capabilities.level).toBe("full");
    expect(capabilities.has_syntax).toBe(true);
  });

  it("uses the runtime sentence segmenter where the locale is supported", () => {
    const capabilities = createLanguageCapabilities("en");
    expect(capabilities.has_sentence_segmenter).toBe(true);
    expect(capabilities.segmentSentences?.("Hello there. How are you?")).toEqual([
      "Hello there.",
      "How are you?",
    ]);
  });

  it("prefers an injected sentence segmenter over the runtime probe", () => {
    const segmenter = (text: string) => [text];
    const capabilities = createLanguageCapabilities("de", { sentenceSegmenter: segmenter });
    expect(capabilities.has_sentence_segmenter).toBe(true);
    expect(capabilities.segmentSentences).toBe(segmenter);
  });

  it("probes each language once", () => {
    const registry = new CapabilityRegistry({ useIntlSegmenter: false });
    expect(registry.for("en")).toBe(registry.for("en"));
    expect(registry.for("de")).not.toBe(registry.for("en"));
  });
});
