import { describe, expect, it } from "vitest";
import { AnnotationSpanError, UnknownTurnError } from "../../errors.js";
import { respondentDoc } from "../../__tests__/fixtures.js";
import { createAnnotation, withoutTimestamp } from "../annotation.js";
import { annotationsToJsonl, Corpus } from "../corpus.js";
import { Document } from "../document.js";
import { documentFromTurns } from "../prepareDocument.js";

const span = (turn_id: number, start: number, matched_text: string) =>
  createAnnotation({
    module: "discourse",
    category: "VOCATION",
    rule_id: "frame_vocation_00",
    pattern: "\\bcalling\\b",
    matched_text,
    start,
    end: start + matched_text.length,
    sentence: "",
    turn_id,
  });

describe("createAnnotation", () => {
  it("rejects a matched text whose length disagrees with the span", () => {
    expect(() =>
      createAnnotation({
        module: "affect",
        category: "HOPE",
        rule_id: "affect_hope_00",
        pattern: "hope",
        matched_text: "hope",
        start: 0,
        end: 3,
        sentence: "",
        turn_id: 1,
      })
    ).toThrow();
  });

  it("drops only the timestamp for comparison", () => {
    const annotation = span(1, 3, "calling");
    const bare = withoutTimestamp(annotation);
    expect("created_at" in bare).toBe(false);
    expect(bare.matched_text).toBe("calling");
  });
});

describe("Document", () => {
  it("requires 1-based contiguous turn ids", () => {
    expect(
      () =>
        new Document({
          doc_id: "d",
          language: "en",
          raw_text: "",
          turns: [{ turn_id: 2, speaker: "Respondent", speaker_label: "B", text: "x", sentences: ["x"] }],
          metadata: { parse_mode: "manual", detected_speakers: [], speaker_mapping: {}, fingerprint: "" },
        })
    ).toThrow("Turn ids must be 1-based and contiguous (expected 1, got 2)");
  });

  it("appends valid annotations and bumps the revision", () => {
    const doc = respondentDoc(["My calling matters."]);
    expect(doc.revision).toBe(0);
    expect(doc.addAnnotations([span(1, 3, "calling")])).toBe(1);
    expect(doc.revision).toBe(1);
    expect(doc.addAnnotations([])).toBe(0);
    expect(doc.revision).toBe(1);
  });

  it("appends nothing when any span disagrees with the turn text", () => {
    const doc = respondentDoc(["My calling matters."]);
    expect(() => doc.addAnnotations([span(1, 3, "calling"), span(1, 0, "calling")])).toThrow(
      AnnotationSpanError
    );
    expect(doc.annotationCount).toBe(0);
    expect(doc.revision).toBe(0);
  });

  it("rejects annotations on unknown turns", () => {
    const doc = respondentDoc(["My calling matters."]);
    expect(() => doc.addAnnotations([span(9, 0, "x")])).toThrow(UnknownTurnError);
    expect(() => doc.getTurn(9)).toThrow("Document doc_test has no turn 9");
  });

  it("filters annotations and summarizes counts", () => {
    const doc = documentFromTurns({
      doc_id: "mixed",
      language: "en",
      turns: [
        { speaker: "Interviewer", text: "What is your calling?", speaker_label: "I" },
        { speaker: "Respondent", text: "My calling matters.", speaker_label: "B" },
      ],
    });
    doc.addAnnotations([span(2, 3, "calling")]);

    expect(doc.getRespondentTurns().map((t) => t.turn_id)).toEqual([2]);
    expect(doc.getInterviewerTurns().map((t) => t.turn_id)).toEqual([1]);
    expect(doc.getAnnotations({ turn_id: 1 })).toEqual([]);
    expect(doc.getAnnotations({ module: "discourse", category: "VOCATION" })).toHaveLength(1);

    const summary = doc.summary();
    expect(summary).toMatchObject({
      doc_id: "mixed",
      turn_count: 2,
      interviewer_turn_count: 1,
      respondent_turn_count: 1,
      sentence_count: 2,
      word_count: 7,
      annotation_count: 1,
      annotations_per_module: { discourse: 1 },
      parse_mode: "manual",
      speaker_mapping: { I: "Interviewer", B: "Respondent" },
    });
    expect(doc.raw_text).toBe("I: What is your calling?\nB: My calling matters.");
  });

  it("keeps turns frozen", () => {
    const doc = respondentDoc(["My calling matters."]);
    expect(Object.isFrozen(doc.getTurn(1))).toBe(true);
    expect(Object.isFrozen(doc.turns)).toBe(true);
  });
});

describe("Corpus", () => {
  it("streams annotations with their document and language", () => {
    const corpus = new Corpus("study");
    const a = respondentDoc(["My calling matters."], "a");
    const b = respondentDoc(["No calling here, calling there."], "b");
    a.addAnnotations([span(1, 3, "calling")]);
    b.addAnnotations([span(1, 3, "calling"), span(1, 17, "calling")]);
    corpus.add(a);
    corpus.add(b);

    const records = corpus.allAnnotations("discourse");
    expect(records.map((r) => [r.doc_id, r.start])).toEqual([
      ["a", 3],
      ["b", 3],
      ["b", 17],
    ]);

    const lines = annotationsToJsonl(records).split("\n");
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[2])).toMatchObject({ doc_id: "b", language: "en", start: 17 });
    expect(corpus.summaryTable().map((s) => s.annotation_count)).toEqual([1, 2]);
    expect(corpus.get("b")).toBe(b);
  });
});
