import { ModuleId } from "../document/annotation.js";
import { Document } from "../document/document.js";
import { PatternCatalog } from "../framebook/patternCatalog.js";
import { AnalyticClaim, byStrength } from "../passes/analyticPass.js";
import { AffectPass } from "../passes/affectPass.js";
import { DiscoursePass } from "../passes/discoursePass.js";
import { NarrativePass } from "../passes/narrativePass.js";
import { PositionPass } from "../passes/positionPass.js";
import { ScoringPolicyV1 } from "../policy/scoringPolicy.v1.js";
import { generateHypotheses, Hypothesis } from "./hypotheses.js";
import {
  TRIANGULATION_CATALOG_V1,
  TriangulationPattern,
  TriangulationPatternId,
} from "./triangulationCatalog.v1.js";
import { buildTurnProfiles, PassSummaries, TurnProfile } from "./turnProfile.js";

export type AnalyticPasses = {
  narrative: NarrativePass;
  position: PositionPass;
  discourse: DiscoursePass;
  affect: AffectPass;
};

export type CondensationPoint = TurnProfile & {
  saliency_score: number;
  saliency_reasons: string[];
};

export type TriangulationMatch = {
  pattern: TriangulationPatternId;
  description: string;
  modules: string[];
  check_question: string;
};

export type TriangulationResult = {
  turn_id: number;
  matches: TriangulationMatch[];
  match_count: number;
  text_preview: string;
};

export type FusedClaim = AnalyticClaim & {
  module: ModuleId;
  frames: string[];
};

export type IntegrationReport = {
  turn_profiles: TurnProfile[];
  condensation_points: CondensationPoint[];
  triangulations: TriangulationResult[];
  hypotheses: Hypothesis[];
  claims: FusedClaim[];
};

/**
 * Cross-module fusion. Reads only the passes' summary views.
 */
export class Integrator {
  constructor(
    private readonly passes: AnalyticPasses,
    private readonly catalog: PatternCatalog,
    private readonly policy: ScoringPolicyV1,
    private readonly patterns: TriangulationPattern[] = TRIANGULATION_CATALOG_V1
  ) {}

  summaries(document: Document): PassSummaries {
    return {
      narrative: this.passes.narrative.summarize(document),
      position: this.passes.position.summarize(document),
      discourse: this.passes.discourse.summarize(document),
      affect: this.passes.affect.summarize(document),
    };
  }

  turnProfiles(document: Document): TurnProfile[] {
    return buildTurnProfiles(document, this.summaries(document), this.policy.integration);
  }

  condensationPoints(profiles: TurnProfile[], n = this.policy.top_n): CondensationPoint[] {
    const s = this.policy.integration;
    const scored = profiles.map((p): CondensationPoint => {
      let score = p.flags.length * s.flag_weight;
      const reasons: string[] = [];
      if (p.flags.length > 0) reasons.push(`Flags: ${p.flags.join(", ")}`);

      if (p.affect_density > s.high_affect_density) {
        score += 3;
        reasons.push(`High affect density: ${p.affect_density}%`);
      } else if (p.affect_density > s.medium_affect_density) {
        score += 1;
      }
      if (p.active_frame_count >= s.multi_frame_min) {
        score += 2;
        reasons.push(`${p.active_frame_count} frames active`);
      }
      if (p.transitions >= s.type_shift_min) {
        score += 2;
        reasons.push(`${p.transitions} discourse-type transitions`);
      }
      if (p.process_structures.length > 0) {
        score += 2;
        reasons.push(`Process structure: ${p.process_structures.join(", ")}`);
      }
      return { ...p, saliency_score: score, saliency_reasons: reasons };
    });
    return scored.sort((a, b) => b.saliency_score - a.saliency_score).slice(0, n);
  }

  triangulate(profiles: TurnProfile[]): TriangulationResult[] {
    const results: TriangulationResult[] = [];
    for (const profile of profiles) {
      const matches = this.patterns
        .filter((pattern) => pattern.matches(profile, this.policy.integration))
        .map((pattern) => ({
          pattern: pattern.id,
          description: pattern.description,
          modules: pattern.modules,
          check_question: pattern.check_question,
        }));
      if (matches.length === 0) continue;
      results.push({
        turn_id: profile.turn_id,
        matches,
        match_count: matches.length,
        text_preview: profile.text_preview,
      });
    }
    return results.sort((a, b) => b.match_count - a.match_count);
  }

  hypotheses(profiles: TurnProfile[]): Hypothesis[] {
    const fallback = this.policy.discourse.default_priority;
    return generateHypotheses(profiles, this.policy.integration, (frame) =>
      this.catalog.priorityOf(frame, fallback)
    );
  }

  /**
   * Turning points, discourse claims and affect condensation sites in one
   * strength-ordered list.
   */
  fuseClaims(document: Document): FusedClaim[] {
    const claims: FusedClaim[] = [];

    for (const point of this.passes.narrative.turningPoints(document)) {
      claims.push({
        module: "narrative",
        type: "TURNING_POINT",
        description: `Narrative turning-point candidate in turn ${point.turn_id}`,
        evidence: point.reasons.join("; "),
        turns: [point.turn_id],
        frames: [],
        strength: point.score,
        check_question: "Does this turn actually mark a turning point in the life story?",
      });
    }

    for (const claim of this.passes.discourse.claims(document)) {
      claims.push({ ...claim, module: "discourse" });
    }

    for (const site of this.passes.affect.condensationSites(document)) {
      claims.push({
        module: "affect",
        type: "AFFECT_CONDENSATION",
        description: `Affective condensation in turn ${site.turn_id}`,
        evidence: site.reasons.join("; "),
        turns: [site.turn_id],
        frames: [],
        strength: site.score,
        check_question:
          "Does the affective condensation coincide with a narrative turning point or a frame shift?",
      });
    }

    return byStrength(claims);
  }

  report(document: Document): IntegrationReport {
    const profiles = this.turnProfiles(document);
    return {
      turn_profiles: profiles,
      condensation_points: this.condensationPoints(profiles),
      triangulations: this.triangulate(profiles),
      hypotheses: this.hypotheses(profiles),
      claims: this.fuseClaims(document),
    };
  }
}
