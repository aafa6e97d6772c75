import { AGENCY } from "../framebook/categoryKeys.js";
import { dominantFrame } from "../passes/discoursePass.js";
import { IntegrationScoring } from "../policy/scoringPolicy.v1.js";
import { TurnProfile } from "./turnProfile.js";

export type HypothesisType =
  | "AGENCY_ARC_DOWNWARD"
  | "AGENCY_ARC_UPWARD"
  | "CENTRAL_FRAME"
  | "RISING_AFFECT";

export type Hypothesis = {
  type: HypothesisType;
  hypothesis: string;
  evidence: string;
  check_question: string;
  to_verify: string;
  turns: number[];
};

const mean = (values: number[]): number =>
  values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Mean position of active-dominant versus passive-dominant turns.
 * Positions are indices into the respondent profile list.
 */
export function agencyArcHypothesis(profiles: TurnProfile[]): Hypothesis | null {
  const active: number[] = [];
  const passive: number[] = [];
  profiles.forEach((p, idx) => {
    if (p.dominant_agency === AGENCY.ACTIVE) active.push(idx);
    if (p.dominant_agency === AGENCY.PASSIVE_SUFFERING) passive.push(idx);
  });
  if (active.length === 0 || passive.length === 0) return null;

  const activeMean = mean(active);
  const passiveMean = mean(passive);
  const activeTurns = active.map((i) => profiles[i].turn_id);
  const passiveTurns = passive.map((i) => profiles[i].turn_id);
  const evidence = `Active-dominant turns: ${activeTurns.join(", ")}; passive-dominant turns: ${passiveTurns.join(", ")}`;
  const turns = [...activeTurns, ...passiveTurns].sort((a, b) => a - b);

  if (activeMean < passiveMean) {
    return {
      type: "AGENCY_ARC_DOWNWARD",
      hypothesis:
        "Possible trajectory: active handling early in the interview gives way to a mode of suffering.",
      evidence,
      check_question: "Is this a biographical trajectory of loss of control?",
      to_verify: "Read the marked turns in the transcript.",
      turns,
    };
  }
  if (passiveMean < activeMean) {
    return {
      type: "AGENCY_ARC_UPWARD",
      hypothesis:
        "Possible transformation: from passive suffering early on to active shaping later.",
      evidence,
      check_question: "Is this a process of transformation?",
      to_verify: "Where exactly does the perspective tip? Is there a trigger?",
      turns,
    };
  }
  return null;
}

export function centralFrameHypothesis(
  profiles: TurnProfile[],
  scoring: IntegrationScoring,
  priorityOf: (frame: string) => number
): Hypothesis | null {
  const totals: Record<string, number> = {};
  for (const profile of profiles) {
    for (const [frame, n] of Object.entries(profile.frames)) {
      totals[frame] = (totals[frame] ?? 0) + n;
    }
  }
  const total = Object.values(totals).reduce((sum, n) => sum + n, 0);
  if (total === 0) return null;

  const dominant = dominantFrame(totals, priorityOf);
  const share = totals[dominant] / total;
  if (share <= scoring.frame_dominance_share) return null;

  const pct = Math.round(share * 100);
  return {
    type: "CENTRAL_FRAME",
    hypothesis: `Frame '${dominant}' dominates the interview (${pct}%). It may be the respondent's central interpretive frame.`,
    evidence: `Frame distribution: ${Object.entries(totals)
      .map(([frame, n]) => `${frame}: ${n}`)
      .join(", ")}`,
    check_question: `Is '${dominant}' the respondent's own reading or an effect of how the questions were asked?`,
    to_verify: "Does the frame appear in answers to different questions?",
    turns: profiles.filter((p) => dominant in p.frames).map((p) => p.turn_id),
  };
}

/**
 * Second-half affect sum against first-half sum; the halves split at floor(n / 2).
 */
export function risingAffectHypothesis(
  profiles: TurnProfile[],
  scoring: IntegrationScoring
): Hypothesis | null {
  if (profiles.length < scoring.affect_trend_min_turns) return null;
  const values = profiles.map((p) => p.affect_density);
  const half = Math.floor(values.length / 2);
  const firstHalf = values.slice(0, half).reduce((sum, v) => sum + v, 0);
  const secondHalf = values.slice(half).reduce((sum, v) => sum + v, 0);
  if (!(secondHalf > firstHalf * scoring.affect_trend_ratio)) return null;

  const peak = profiles[values.indexOf(Math.max(...values))].turn_id;
  return {
    type: "RISING_AFFECT",
    hypothesis:
      "Affective intensity rises over the interview; the conversation may be moving toward an emotionally charged core issue.",
    evidence: `First half: ${firstHalf.toFixed(1)}, second half: ${secondHalf.toFixed(1)}`,
    check_question:
      "Do the questions lead there deliberately, or does the respondent open up step by step?",
    to_verify: `Key passage: turn ${peak}`,
    turns: [peak],
  };
}

export function generateHypotheses(
  profiles: TurnProfile[],
  scoring: IntegrationScoring,
  priorityOf: (frame: string) => number
): Hypothesis[] {
  if (profiles.length === 0) return [];
  return [
    agencyArcHypothesis(profiles),
    centralFrameHypothesis(profiles, scoring, priorityOf),
    risingAffectHypothesis(profiles, scoring),
  ].filter((h): h is Hypothesis => h !== null);
}
