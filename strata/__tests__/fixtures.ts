import { PatternAnnotator } from "../annotate/patternAnnotator.js";
import { Diagnostics } from "../diagnostics/diagnostics.js";
import { Document } from "../document/document.js";
import { documentFromTurns } from "../document/prepareDocument.js";
import { RESPONDENT } from "../document/turn.js";
import { Framebook } from "../framebook/framebook.schema.js";
import { buildFramebook } from "../framebook/loadFramebook.js";
import { PatternCatalog } from "../framebook/patternCatalog.js";
import { CapabilityOptions, CapabilityRegistry } from "../language/languageCapabilities.js";
import { PassContext } from "../passes/analyticPass.js";
import { SCORING_POLICY_V1 } from "../policy/scoringPolicy.v1.js";

const en = (...patterns: string[]) => ({ patterns: { en: patterns } });

/** Small English framebook whose patterns are easy to trace by hand. */
export function testFramebookRaw(): Record<string, unknown> {
  return {
    version: "test",
    discourse_types: {
      NARRATION: en("\\bthen\\b", "\\byesterday\\b"),
      ARGUMENTATION: en("\\bbecause\\b", "\\btherefore\\b"),
      DESCRIPTION: en("\\busually\\b"),
    },
    process_structures: {
      ACTION_SCHEME: en("\\bplanned\\b"),
      TRAJECTORY: en("\\bno longer\\b", "\\bcollapsed\\b"),
      TRANSFORMATION: en("\\brealized\\b"),
      INSTITUTIONAL_EXPECTATION: en("\\bapprenticeship\\b"),
    },
    pronouns: {
      en: {
        SELF: "\\bI\\b",
        WE: "\\bwe\\b",
        THEY: ["\\bthey\\b", "\\bthem\\b"],
      },
    },
    agency: {
      ACTIVE: en("\\bI decided\\b", "\\bI fought\\b"),
      PASSIVE_SUFFERING: en("\\bwas forced\\b", "\\bhad no choice\\b"),
      MORAL_REFLECTIVE: en("\\bshould have\\b"),
    },
    frames: {
      LEGITIMACY_JUSTICE: en("\\bunfair\\b", "\\bjustice\\b"),
      ECONOMIZATION: en("\\bcosts?\\b", "\\bprofit\\b"),
      INSTITUTIONAL_LOGIC: en("\\bregulations?\\b"),
      SYSTEM_FAILURE: en("\\bsystem failed\\b"),
      VULNERABILITY: en("\\bfragile\\b"),
      NORMALIZATION: en("\\bnormal\\b"),
      VOCATION: en("\\bcalling\\b"),
      FAMILY: en("\\bfamily\\b"),
    },
    topoi: {
      NECESSITY: en("\\bhad to\\b"),
    },
    affect_dimensions: {
      FEAR_INSECURITY: en("\\bafraid\\b", "\\bscared\\b"),
      ANGER_INDIGNATION: en("\\bangry\\b", "\\bfurious\\b"),
      AMBIVALENCE: en("\\bon the other hand\\b"),
      BODILY_REFERENCE: en("\\bstomach\\b"),
      DISTANCING: en("\\bsomehow\\b"),
    },
    frame_priorities: { SYSTEM_FAILURE: 30, LEGITIMACY_JUSTICE: 25 },
    frame_conflicts: [
      { trigger_frame: "SYSTEM_FAILURE", target_frame: "INSTITUTIONAL_LOGIC", downweight_factor: 0.5 },
    ],
    frame_tensions: [
      { frame_a: "VOCATION", frame_b: "ECONOMIZATION", description: "Calling vs. cost pressure" },
    ],
    frame_roles: {
      claim: ["LEGITIMACY_JUSTICE"],
      structure: ["ECONOMIZATION", "INSTITUTIONAL_LOGIC"],
      context: {
        amplifying: ["VULNERABILITY"],
        dampening: ["NORMALIZATION"],
        neutral: ["SYSTEM_FAILURE", "VOCATION"],
      },
    },
  };
}

export function testFramebook(): Framebook {
  return buildFramebook(testFramebookRaw()).framebook;
}

export function createTestContext(
  framebook: Framebook = testFramebook(),
  capabilities: CapabilityOptions = { useIntlSegmenter: false }
): PassContext {
  const diagnostics = new Diagnostics();
  return {
    annotator: new PatternAnnotator(diagnostics),
    catalog: new PatternCatalog(framebook, diagnostics),
    diagnostics,
    capabilities: new CapabilityRegistry(capabilities),
    policy: SCORING_POLICY_V1,
  };
}

/** English document whose turns are all respondent turns, ids 1..n. */
export function respondentDoc(texts: string[], doc_id = "doc_test"): Document {
  return documentFromTurns({
    doc_id,
    language: "en",
    turns: texts.map((text) => ({ speaker: RESPONDENT, text, speaker_label: "B" })),
  });
}
