import { Document } from "../document/document.js";
import { textPreview } from "../document/turn.js";
import { AGENCY, NONE, PROCESS_STRUCTURE } from "../framebook/categoryKeys.js";
import { AffectTurnSummary } from "../passes/affectPass.js";
import { DiscourseTurnSummary } from "../passes/discoursePass.js";
import { NarrativeTurnSummary } from "../passes/narrativePass.js";
import { PositionTurnSummary } from "../passes/positionPass.js";
import { IntegrationScoring } from "../policy/scoringPolicy.v1.js";

export type TurnFlag =
  | "TRAJECTORY_CURVE"
  | "TRANSFORMATION"
  | "HIGH_AFFECT"
  | "PASSIVE"
  | "MULTI_FRAME"
  | "TYPE_SHIFTS";

export type PassSummaries = {
  narrative: NarrativeTurnSummary[];
  position: PositionTurnSummary[];
  discourse: DiscourseTurnSummary[];
  affect: AffectTurnSummary[];
};

export type TurnProfile = {
  turn_id: number;
  word_count: number;
  text_preview: string;
  // narrative
  sequence_short: string;
  process_structures: string[];
  transitions: number;
  // position
  dominant_agency: string;
  agency_density: number;
  pronouns: Record<string, number>;
  // discourse
  dominant_frame: string;
  active_frame_count: number;
  frames: Record<string, number>;
  // affect
  affect_density: number;
  affect_dimensions: string[];
  flags: TurnFlag[];
  annotation_count: number;
};

const byTurn = <T extends { turn_id: number }>(rows: T[]): Map<number, T> =>
  new Map(rows.map((row) => [row.turn_id, row]));

export function turnFlags(
  profile: Omit<TurnProfile, "flags">,
  scoring: IntegrationScoring
): TurnFlag[] {
  const flags: TurnFlag[] = [];
  if (profile.process_structures.includes(PROCESS_STRUCTURE.TRAJECTORY)) flags.push("TRAJECTORY_CURVE");
  if (profile.process_structures.includes(PROCESS_STRUCTURE.TRANSFORMATION)) flags.push("TRANSFORMATION");
  if (profile.affect_density > scoring.high_affect_density) flags.push("HIGH_AFFECT");
  if (profile.dominant_agency === AGENCY.PASSIVE_SUFFERING) flags.push("PASSIVE");
  if (profile.active_frame_count >= scoring.multi_frame_min) flags.push("MULTI_FRAME");
  if (profile.transitions >= scoring.type_shift_min) flags.push("TYPE_SHIFTS");
  return flags;
}

/**
 * One merged row per respondent turn. A pass without a row for the turn
 * contributes its empty values.
 */
export function buildTurnProfiles(
  document: Document,
  summaries: PassSummaries,
  scoring: IntegrationScoring
): TurnProfile[] {
  const narrative = byTurn(summaries.narrative);
  const position = byTurn(summaries.position);
  const discourse = byTurn(summaries.discourse);
  const affect = byTurn(summaries.affect);

  return document.getRespondentTurns().map((turn) => {
    const a = narrative.get(turn.turn_id);
    const b = position.get(turn.turn_id);
    const c = discourse.get(turn.turn_id);
    const d = affect.get(turn.turn_id);

    const base: Omit<TurnProfile, "flags"> = {
      turn_id: turn.turn_id,
      word_count: b?.word_count ?? d?.word_count ?? 0,
      text_preview: textPreview(turn.text, 150),
      sequence_short: a?.sequence_short ?? "",
      process_structures: a?.process_structures ?? [],
      transitions: a?.transitions ?? 0,
      dominant_agency: b?.dominant_agency ?? NONE,
      agency_density: b?.agency_density ?? 0,
      pronouns: b?.pronouns ?? {},
      dominant_frame: c?.dominant_frame ?? NONE,
      active_frame_count: c?.active_frame_count ?? 0,
      frames: c?.frames ?? {},
      affect_density: d?.marker_density ?? 0,
      affect_dimensions: d?.active_dimensions ?? [],
      annotation_count: document.getAnnotations({ turn_id: turn.turn_id }).length,
    };
    return { ...base, flags: turnFlags(base, scoring) };
  });
}
