/**
 * Triangulation Catalog v1
 *
 * Named cross-module patterns. Each is a conjunction over signals from
 * independent passes; a turn may match several.
 */

import { AFFECT_DIMENSION, AGENCY, FRAME } from "../framebook/categoryKeys.js";
import { IntegrationScoring } from "../policy/scoringPolicy.v1.js";
import { TurnProfile } from "./turnProfile.js";

export type TriangulationPatternId =
  | "CRISIS"
  | "RESISTANCE"
  | "AMBIVALENT_COMMITMENT"
  | "NARRATIVE_TRANSFORMATION"
  | "EMBODIED_AFFECT";

export interface TriangulationPattern {
  id: TriangulationPatternId;
  description: string;
  /** Which passes contribute, and with what signal */
  modules: string[];
  check_question: string;
  matches: (profile: TurnProfile, scoring: IntegrationScoring) => boolean;
}

export const TRIANGULATION_CATALOG_V1: TriangulationPattern[] = [
  {
    id: "CRISIS",
    description: "Trajectory curve + passive subject + raised affect",
    modules: ["narrative (trajectory)", "position (passive suffering)", "affect (density)"],
    check_question:
      "Is this a biographical turning point? How is the crisis worked through narratively?",
    matches: (p, s) =>
      p.flags.includes("TRAJECTORY_CURVE") &&
      (p.flags.includes("PASSIVE") || p.dominant_agency === AGENCY.PASSIVE_SUFFERING) &&
      p.affect_density > s.crisis_min_affect,
  },
  {
    id: "RESISTANCE",
    description: "System critique + active or moral agency",
    modules: ["position (agency)", "discourse (system failure)"],
    check_question:
      "Does the respondent position themselves as resisting? Against whom or what?",
    matches: (p) =>
      FRAME.SYSTEM_FAILURE in p.frames &&
      (p.dominant_agency === AGENCY.ACTIVE || p.dominant_agency === AGENCY.MORAL_REFLECTIVE),
  },
  {
    id: "AMBIVALENT_COMMITMENT",
    description: "Vocation frame + economic pressure or ambivalence",
    modules: ["discourse (vocation, economization)", "affect (ambivalence)"],
    check_question:
      "How does the respondent negotiate conviction against external pressure?",
    matches: (p) =>
      FRAME.VOCATION in p.frames &&
      (FRAME.ECONOMIZATION in p.frames ||
        p.affect_dimensions.includes(AFFECT_DIMENSION.AMBIVALENCE)),
  },
  {
    id: "NARRATIVE_TRANSFORMATION",
    description: "Transformation + discourse-type shift, a possible reorientation",
    modules: ["narrative (transformation)", "narrative (type transitions)"],
    check_question: "Is a move from suffering toward acting visible here?",
    matches: (p) => p.flags.includes("TRANSFORMATION") && p.transitions >= 1,
  },
  {
    id: "EMBODIED_AFFECT",
    description: "High affect density + bodily references",
    modules: ["affect (density)", "affect (bodily reference)"],
    check_question:
      "Is something expressed here that is hard to put into words? Check the bodily dimension.",
    matches: (p, s) =>
      p.affect_dimensions.includes(AFFECT_DIMENSION.BODILY_REFERENCE) &&
      p.affect_density > s.embodied_min_affect,
  },
];
