/**
 * Scoring Policy v1
 *
 * Weights and thresholds shared by the ranking heuristics of the analytic passes,
 * the integrator and the justice engine. Every score in a report can be recomputed
 * by hand from these numbers and the annotation counts.
 */

export interface NarrativeScoring {
  /** Points per discourse-type transition inside a turn */
  transition_weight: number;
  /** Points per distinct process structure when more than one co-occurs */
  overlap_weight: number;
  /** Points when exactly one process structure is present */
  single_structure_bonus: number;
  /** Extra points when the trajectory structure is among them */
  trajectory_bonus: number;
}

export interface DiscourseScoring {
  /** Priority of a frame missing from frame_priorities */
  default_priority: number;
  /** Adjusted share above which the interview-wide dominant frame yields a claim */
  dominance_share: number;
  /** Minimum number of turns a frame pair must share */
  cooccurrence_min_turns: number;
  /** Count difference between first and last third that must be exceeded */
  trajectory_min_difference: number;
}

export interface AffectScoring {
  high_density: number;
  high_density_points: number;
  medium_density: number;
  medium_density_points: number;
  /** Active dimensions for the multidimensional bonus */
  many_dimensions: number;
  many_dimensions_points: number;
  some_dimensions: number;
  some_dimensions_points: number;
  ambivalence_points: number;
  bodily_reference_points: number;
  distancing_points: number;
}

export interface IntegrationScoring {
  flag_weight: number;
  high_affect_density: number;
  medium_affect_density: number;
  multi_frame_min: number;
  type_shift_min: number;
  /** Share of all frame occurrences for the central-frame hypothesis */
  frame_dominance_share: number;
  /** Second-half affect sum must exceed first-half sum times this */
  affect_trend_ratio: number;
  affect_trend_min_turns: number;
  crisis_min_affect: number;
  embodied_min_affect: number;
}

export interface JusticeScoring {
  affect_cap: number;
  passive_agency_mult: number;
  moral_agency_mult: number;
  amplifying_mult: number;
  dampening_mult: number;
  /** Characters per normalisation unit for intensity_norm */
  norm_chars: number;
  peak_count: number;
  strong_percentile: number;
  trajectory_ratio: number;
  trajectory_min_sites: number;
  density_claim_min: number;
}

export interface ScoringPolicyV1 {
  scoring_policy_version: string;
  /** Default length of every ranked list */
  top_n: number;
  narrative: NarrativeScoring;
  discourse: DiscourseScoring;
  affect: AffectScoring;
  integration: IntegrationScoring;
  justice: JusticeScoring;
}

export const SCORING_POLICY_V1: ScoringPolicyV1 = {
  scoring_policy_version: "scoring_v1",
  top_n: 5,
  narrative: {
    transition_weight: 2,
    overlap_weight: 3,
    single_structure_bonus: 1,
    trajectory_bonus: 2,
  },
  discourse: {
    default_priority: 10,
    dominance_share: 0.4,
    cooccurrence_min_turns: 2,
    trajectory_min_difference: 1,
  },
  affect: {
    high_density: 5,
    high_density_points: 3,
    medium_density: 2,
    medium_density_points: 1,
    many_dimensions: 3,
    many_dimensions_points: 3,
    some_dimensions: 2,
    some_dimensions_points: 1,
    ambivalence_points: 2,
    bodily_reference_points: 2,
    distancing_points: 1,
  },
  integration: {
    flag_weight: 3,
    high_affect_density: 5,
    medium_affect_density: 2,
    multi_frame_min: 3,
    type_shift_min: 2,
    frame_dominance_share: 0.35,
    affect_trend_ratio: 1.5,
    affect_trend_min_turns: 3,
    crisis_min_affect: 2,
    embodied_min_affect: 3,
  },
  justice: {
    affect_cap: 1.25,
    passive_agency_mult: 1.2,
    moral_agency_mult: 1.1,
    amplifying_mult: 1.1,
    dampening_mult: 0.9,
    norm_chars: 1000,
    peak_count: 3,
    strong_percentile: 0.75,
    trajectory_ratio: 1.3,
    trajectory_min_sites: 3,
    density_claim_min: 0.5,
  },
};
