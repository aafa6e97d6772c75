import { describe, expect, it } from "vitest";
import { testFramebook } from "../../__tests__/fixtures.js";
import { withoutTimestamp } from "../../document/annotation.js";
import { Corpus } from "../../document/corpus.js";
import { Document } from "../../document/document.js";
import { prepareDocument } from "../../document/prepareDocument.js";
import { loadFramebook } from "../../framebook/loadFramebook.js";
import { Turn } from "../../document/turn.js";
import { StrataAnalyzer } from "../analyzeDocument.js";

const TRANSCRIPT = [
  "I: How did it begin?",
  "B: Then we moved. Because the rent was unfair and the costs were high. Then it collapsed.",
  "I: And how did you feel?",
  "B: I was forced out. I was afraid, somehow, and my stomach hurt.",
].join("\n");

class BrokenDocument extends Document {
  getRespondentTurns(): Turn[] {
    throw new Error("broken turns");
  }
}

const analyzer = () =>
  new StrataAnalyzer(testFramebook(), { capabilities: { useIntlSegmenter: false } });

describe("StrataAnalyzer", () => {
  it("runs every pass and reports all layers", () => {
    const doc = prepareDocument(TRANSCRIPT, { doc_id: "t1", language: "en" });
    const report = analyzer().analyzeDocument(doc);

    expect(report.document.respondent_turn_count).toBe(2);
    expect(report.passes.narrative).toBeGreaterThan(0);
    expect(report.passes.affect).toBe(3);
    expect(report.capabilities).toEqual({
      language: "en",
      level: "light",
      sentence_segmenter: false,
      syntax: false,
    });
    expect(report.integration.turn_profiles.map((p) => p.turn_id)).toEqual([2, 4]);
    expect(report.justice.turns.map((p) => p.is_justice_site)).toEqual([true, false]);
    expect(report.diagnostics.map((d) => d.code)).toEqual(["syntax_unavailable"]);
  });

  it("annotates interviewer turns never", () => {
    const doc = prepareDocument(TRANSCRIPT, { language: "en" });
    analyzer().analyzeDocument(doc);
    expect(doc.getAnnotations({ turn_id: 1 })).toEqual([]);
    expect(doc.getAnnotations({ turn_id: 3 })).toEqual([]);
  });

  it("produces the same annotations for the same text and framebook", () => {
    const first = prepareDocument(TRANSCRIPT, { language: "en" });
    const second = prepareDocument(TRANSCRIPT, { language: "en" });
    analyzer().analyzeDocument(first);
    analyzer().analyzeDocument(second);

    expect(second.annotations.map(withoutTimestamp)).toEqual(
      first.annotations.map(withoutTimestamp)
    );
  });

  it("does not annotate a document twice", () => {
    const doc = prepareDocument(TRANSCRIPT, { language: "en" });
    const strata = analyzer();
    strata.annotate(doc);
    const count = doc.annotationCount;

    expect(strata.annotate(doc)).toEqual({ narrative: 0, position: 0, discourse: 0, affect: 0 });
    expect(doc.annotationCount).toBe(count);
  });

  it("records a failing document and continues the batch", () => {
    const corpus = new Corpus("batch");
    const good = prepareDocument(TRANSCRIPT, { doc_id: "good", language: "en" });
    corpus.add(
      new BrokenDocument({
        doc_id: "broken",
        language: "en",
        raw_text: "",
        turns: [],
        metadata: good.metadata,
      })
    );
    corpus.add(good);

    const result = analyzer().analyzeCorpus(corpus);
    expect(result.failed).toEqual(["broken"]);
    expect(result.reports.map((r) => r.document.doc_id)).toEqual(["good"]);
    expect(result.diagnostics.filter((d) => d.code === "document_failed")).toEqual([
      { code: "document_failed", message: "broken turns", doc_id: "broken" },
    ]);
  });

  it("prepares transcripts with the segmenter it reports", () => {
    const strata = new StrataAnalyzer(testFramebook(), {
      capabilities: { sentenceSegmenter: (text) => [text.trim()] },
    });
    const doc = strata.prepare("Es war z.B. schwer... Aber gut!", { doc_id: "seg", language: "en" });

    expect(doc.turns.map((t) => t.sentences)).toEqual([["Es war z.B. schwer... Aber gut!"]]);
    expect(strata.analyzeDocument(doc).capabilities.sentence_segmenter).toBe(true);
  });

  it("falls back to the regex splitter without a segmenter", () => {
    const doc = analyzer().prepare("Es war z.B. schwer... Aber gut!", { language: "en" });
    expect(doc.turns.map((t) => t.sentences)).toEqual([["Es war z.B.", "schwer...", "Aber gut!"]]);
  });

  it("lists the framebook languages", () => {
    expect(analyzer().languages()).toEqual(["en"]);
  });

  it("finds German process structures with the bundled framebook", () => {
    const strata = new StrataAnalyzer(loadFramebook().framebook, {
      capabilities: { useIntlSegmenter: false },
    });
    const doc = strata.prepare("Ich war völlig überfordert damals.", { language: "de" });
    const report = strata.analyzeDocument(doc);

    expect(
      doc.getAnnotations({ category: "TRAJECTORY" }).map((a) => [a.rule_id, a.matched_text])
    ).toEqual([["ps_trajectory_01", "überfordert"]]);
    expect(report.integration.turn_profiles[0].flags).toContain("TRAJECTORY_CURVE");
  });
});
