import { describe, expect, it, vi } from "vitest";
import { createTestContext, respondentDoc, testFramebook } from "../../__tests__/fixtures.js";
import { createAnnotation } from "../../document/annotation.js";
import { Document } from "../../document/document.js";
import { resolveFrameRoles } from "../../framebook/frameRoles.js";
import { AffectPass } from "../../passes/affectPass.js";
import { DiscoursePass } from "../../passes/discoursePass.js";
import { PositionPass } from "../../passes/positionPass.js";
import { SCORING_POLICY_V1 } from "../../policy/scoringPolicy.v1.js";
import { JusticeEngine } from "../justiceEngine.js";

const SIX_TURNS = [
  "We moved to the city in spring.",
  "It was unfair and the costs kept rising every single month for all of us in the old apartment building.",
  "My sister helped with the children.",
  "Later I found a small job nearby.",
  "I was forced out and I was afraid and angry because it was unfair and the costs were simply too high for people like us.",
  "Now things are calmer.",
];

function createEngine() {
  const ctx = createTestContext();
  const passes = {
    position: new PositionPass(ctx),
    discourse: new DiscoursePass(ctx),
    affect: new AffectPass(ctx),
  };
  const engine = new JusticeEngine(
    passes,
    resolveFrameRoles(testFramebook()),
    SCORING_POLICY_V1.justice
  );
  const analyze = (doc: Document) => {
    Object.values(passes).forEach((pass) => pass.analyze(doc));
    return doc;
  };
  return { engine, analyze, passes };
}

describe("JusticeEngine.profileTurn", () => {
  const turn = {
    turn_id: 1,
    speaker: "Respondent",
    speaker_label: "B",
    text: "x".repeat(500),
    sentences: [],
  };

  it("multiplies base tension by affect, agency and context", () => {
    const { engine } = createEngine();
    const profile = engine.profileTurn(turn, {
      frames: { LEGITIMACY_JUSTICE: 2, ECONOMIZATION: 2, VULNERABILITY: 1, FAMILY: 1 },
      dominant_agency: "PASSIVE_SUFFERING",
      affect_density: 8,
    });

    expect(profile).toMatchObject({
      claim_total: 2,
      structure_total: 2,
      base: 2,
      affect_mult: 1.08,
      agency_mult: 1.2,
      context_mult: 1.1,
      context_frames: ["VULNERABILITY"],
      intensity: 2.85,
      intensity_norm: 5.7,
      context_tags: ["FAMILY"],
      is_justice_site: true,
    });
    expect(profile.tension_axes).toEqual([
      {
        claim_frame: "LEGITIMACY_JUSTICE",
        structure_frame: "ECONOMIZATION",
        label: "Fairness vs. market logic",
        intensity: 2.85,
        context_tags: ["FAMILY"],
      },
    ]);
  });

  it("caps the affect multiplier", () => {
    const { engine } = createEngine();
    const profile = engine.profileTurn(turn, {
      frames: { LEGITIMACY_JUSTICE: 1, INSTITUTIONAL_LOGIC: 1 },
      dominant_agency: "-",
      affect_density: 60,
    });
    expect(profile.affect_mult).toBe(1.25);
    expect(profile.agency_mult).toBe(1);
  });

  it("is no justice site when one side is missing", () => {
    const { engine } = createEngine();
    const profile = engine.profileTurn(turn, {
      frames: { LEGITIMACY_JUSTICE: 3, NORMALIZATION: 1 },
      dominant_agency: "PASSIVE_SUFFERING",
      affect_density: 8,
    });
    expect(profile).toMatchObject({
      base: 0,
      intensity: 0,
      intensity_norm: 0,
      tension_axes: [],
      is_justice_site: false,
    });
  });
});

describe("JusticeEngine on a document", () => {
  it("finds the shared axis of two justice sites and ranks the charged one first", () => {
    const { engine, analyze } = createEngine();
    const doc = analyze(respondentDoc(SIX_TURNS));

    const turns = engine.turnProfiles(doc);
    expect(turns.filter((p) => p.is_justice_site).map((p) => p.turn_id)).toEqual([2, 5]);
    for (const p of turns) {
      expect(p.base === 0).toBe(p.claim_total === 0 || p.structure_total === 0);
    }

    const fifth = turns[4];
    expect(fifth).toMatchObject({
      affect_mult: 1.08,
      agency_mult: 1.2,
      agency_label: "PASSIVE_SUFFERING",
      intensity: 1.3,
      intensity_norm: 10.8,
      is_strong_site: true,
    });
    expect(turns[1]).toMatchObject({
      affect_mult: 1,
      agency_mult: 1,
      intensity_norm: 9.71,
      is_strong_site: false,
    });

    const interview = engine.interviewProfile(doc);
    expect(interview).toMatchObject({
      justice_score: 20.51,
      justice_density: 0.33,
      site_count: 2,
      turn_count: 6,
      peak_turns: [5, 2],
      strong_threshold: 10.8,
      trajectory: "insufficient_data",
      dominant_tension: {
        claim_frame: "LEGITIMACY_JUSTICE",
        structure_frame: "ECONOMIZATION",
        label: "Fairness vs. market logic",
        count: 2,
        total_intensity: 2.3,
      },
    });

    const claims = engine.claims(doc);
    expect(claims.map((c) => c.type)).toEqual(["JUSTICE_PEAK", "JUSTICE_DOMINANCE"]);
    expect(claims[1]).toMatchObject({
      description: "The central justice tension is Fairness vs. market logic (2 turns, intensity 2.3).",
      evidence: "Axis LEGITIMACY_JUSTICE × ECONOMIZATION in turns 2, 5",
      turns: [2, 5],
    });
    expect(claims[0]).toMatchObject({
      description:
        "Turn 5 is an intense (in)justice site (intensity 10.8 per 1000 chars, PASSIVE_SUFFERING, axis: Fairness vs. market logic).",
      evidence: "base 1 × affect 1.08 × agency 1.2 × context 1",
      turns: [5],
    });
  });

  it("reports context frames and density", () => {
    const { engine, analyze } = createEngine();
    const doc = analyze(respondentDoc(["It is unfair, the costs, my family."]));

    const claims = engine.claims(doc);
    expect(claims.map((c) => c.type)).toEqual([
      "JUSTICE_PEAK",
      "JUSTICE_DOMINANCE",
      "JUSTICE_DENSITY",
      "JUSTICE_CONTEXT",
    ]);
    expect(claims[1].description).toBe(
      "The central justice tension is Fairness vs. market logic (1 turns, intensity 1) (contextualised by: FAMILY)."
    );
    expect(claims[3].description).toBe(
      "Justice tensions are modulated by context-specific frames: FAMILY."
    );
  });

  it("resolves to empty aggregates without justice sites", () => {
    const { engine, analyze } = createEngine();
    const doc = analyze(respondentDoc(["Nothing unusual here."]));

    expect(engine.interviewProfile(doc)).toEqual({
      justice_score: 0,
      justice_density: 0,
      site_count: 0,
      turn_count: 1,
      peak_turns: [],
      dominant_tension: null,
      trajectory: "insufficient_data",
      tension_axes: [],
      strong_threshold: 0,
    });
    expect(engine.claims(doc)).toEqual([]);
  });

  it("recomputes only after the document changes", () => {
    const { engine, analyze, passes } = createEngine();
    const doc = analyze(respondentDoc(SIX_TURNS));
    const summarize = vi.spyOn(passes.discourse, "summarize");

    engine.turnProfiles(doc);
    engine.claims(doc);
    expect(summarize).toHaveBeenCalledTimes(1);

    doc.addAnnotations([
      createAnnotation({
        module: "affect",
        category: "HOPE",
        rule_id: "affect_hope_00",
        pattern: "spring",
        matched_text: "spring",
        start: 24,
        end: 30,
        sentence: "We moved to the city in spring.",
        turn_id: 1,
      }),
    ]);
    engine.turnProfiles(doc);
    expect(summarize).toHaveBeenCalledTimes(2);
  });

  it("hands out profiles that callers cannot corrupt", () => {
    const { engine, analyze } = createEngine();
    const doc = analyze(respondentDoc(SIX_TURNS));
    const before = engine.claims(doc);

    const turns = engine.turnProfiles(doc);
    turns.sort((a, b) => a.intensity_norm - b.intensity_norm);
    turns[5].is_strong_site = false;
    turns[5].intensity_norm = 0;
    const interview = engine.interviewProfile(doc);
    interview.dominant_tension = null;
    interview.tension_axes.length = 0;

    expect(engine.claims(doc)).toEqual(before);
    expect(engine.turnProfiles(doc)[4].intensity_norm).toBe(10.8);
  });
});

const site = (length: number) => "Unfair costs".padEnd(length, " ok");

describe("JusticeEngine trajectory and peaks", () => {
  it("claims a rising tension and caps peaks at three strong sites", () => {
    const { engine, analyze } = createEngine();
    const doc = analyze(respondentDoc([500, 200, 200, 200, 200, 200].map(site)));

    const interview = engine.interviewProfile(doc);
    expect(engine.turnProfiles(doc).map((p) => p.intensity_norm)).toEqual([2, 5, 5, 5, 5, 5]);
    expect(interview).toMatchObject({
      justice_score: 27,
      strong_threshold: 5,
      trajectory: "rising",
    });

    const claims = engine.claims(doc);
    expect(claims.filter((c) => c.type === "JUSTICE_PEAK").map((c) => c.turns)).toEqual([
      [2],
      [3],
      [4],
    ]);
    expect(claims.filter((c) => c.type === "JUSTICE_TRAJECTORY")).toEqual([
      {
        type: "JUSTICE_TRAJECTORY",
        description: "Justice tension is rising over the course of the interview.",
        evidence: "6 justice sites, score 27",
        turns: [],
        strength: 27,
        check_question: "Does the change line up with frame shifts or changes in agency?",
      },
    ]);
  });

  it("claims a falling tension", () => {
    const { engine, analyze } = createEngine();
    const doc = analyze(respondentDoc([200, 200, 200, 200, 200, 500].map(site)));

    expect(engine.interviewProfile(doc).trajectory).toBe("falling");
    expect(
      engine.claims(doc).filter((c) => c.type === "JUSTICE_TRAJECTORY").map((c) => c.description)
    ).toEqual(["Justice tension is falling over the course of the interview."]);
  });

  it("makes no trajectory claim when the tension is stable", () => {
    const { engine, analyze } = createEngine();
    const doc = analyze(respondentDoc([200, 200, 200, 200].map(site)));

    expect(engine.interviewProfile(doc).trajectory).toBe("stable");
    const claims = engine.claims(doc);
    expect(claims.some((c) => c.type === "JUSTICE_TRAJECTORY")).toBe(false);
    expect(claims.filter((c) => c.type === "JUSTICE_PEAK")).toHaveLength(3);
  });
});
