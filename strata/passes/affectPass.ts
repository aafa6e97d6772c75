import { computeDensity } from "../annotate/density.js";
import { Annotation } from "../document/annotation.js";
import { Document } from "../document/document.js";
import { textPreview, wordCount } from "../document/turn.js";
import { AFFECT_DIMENSION } from "../framebook/categoryKeys.js";
import { AnalyticPass, countBy, PassContext } from "./analyticPass.js";

export type AffectTurnSummary = {
  turn_id: number;
  word_count: number;
  marker_count: number;
  /** Markers per 100 words. */
  marker_density: number;
  dimensions: Record<string, number>;
  active_dimensions: string[];
  active_dimension_count: number;
};

export type CondensationSite = {
  turn_id: number;
  score: number;
  reasons: string[];
  marker_density: number;
  marker_count: number;
  dimensions: Record<string, number>;
  text_preview: string;
};

/**
 * Affect: where markers cluster, not whether a turn is positive or negative.
 */
export class AffectPass implements AnalyticPass<AffectTurnSummary> {
  readonly module = "affect" as const;

  constructor(private readonly ctx: PassContext) {}

  analyze(document: Document): number {
    const { annotator, catalog } = this.ctx;
    const annotations: Annotation[] = [];

    for (const turn of document.getRespondentTurns()) {
      for (const dimension of catalog.categories("affect_dimensions")) {
        annotations.push(
          ...annotator.annotate({
            module: this.module,
            category: dimension,
            patterns: catalog.patternsFor("affect_dimensions", dimension, document.language),
            text: turn.text,
            turn_id: turn.turn_id,
            rule_prefix: `affect_${dimension.toLowerCase()}`,
          })
        );
      }
    }

    return document.addAnnotations(annotations);
  }

  summarize(document: Document): AffectTurnSummary[] {
    return document.getRespondentTurns().map((turn) => {
      const own = document.getAnnotations({ module: this.module, turn_id: turn.turn_id });
      const dimensions = countBy(own.map((a) => a.category));
      const active = Object.keys(dimensions);
      const words = wordCount(turn);

      return {
        turn_id: turn.turn_id,
        word_count: words,
        marker_count: own.length,
        marker_density: computeDensity(own.length, words),
        dimensions,
        active_dimensions: active,
        active_dimension_count: active.length,
      };
    });
  }

  condensationSites(document: Document, n = this.ctx.policy.top_n): CondensationSite[] {
    const weights = this.ctx.policy.affect;
    const texts = new Map(document.getRespondentTurns().map((t) => [t.turn_id, t.text]));
    const sites: CondensationSite[] = [];

    for (const row of this.summarize(document)) {
      if (row.marker_count === 0) continue;
      let score = 0;
      const reasons: string[] = [];

      if (row.marker_density > weights.high_density) {
        score += weights.high_density_points;
        reasons.push(`High marker density: ${row.marker_density}%`);
      } else if (row.marker_density > weights.medium_density) {
        score += weights.medium_density_points;
        reasons.push(`Medium marker density: ${row.marker_density}%`);
      }

      if (row.active_dimension_count >= weights.many_dimensions) {
        score += weights.many_dimensions_points;
        reasons.push(`Multidimensional: ${row.active_dimension_count} dimensions active`);
      } else if (row.active_dimension_count >= weights.some_dimensions) {
        score += weights.some_dimensions_points;
        reasons.push(`${row.active_dimension_count} dimensions active`);
      }

      const ambivalence = row.dimensions[AFFECT_DIMENSION.AMBIVALENCE];
      if (ambivalence) {
        score += weights.ambivalence_points;
        reasons.push(`Ambivalence (${ambivalence}x)`);
      }
      const bodily = row.dimensions[AFFECT_DIMENSION.BODILY_REFERENCE];
      if (bodily) {
        score += weights.bodily_reference_points;
        reasons.push(`Bodily reference (${bodily}x)`);
      }
      const distancing = row.dimensions[AFFECT_DIMENSION.DISTANCING];
      if (distancing) {
        score += weights.distancing_points;
        reasons.push(`Distancing markers (${distancing}x)`);
      }

      sites.push({
        turn_id: row.turn_id,
        score,
        reasons,
        marker_density: row.marker_density,
        marker_count: row.marker_count,
        dimensions: row.dimensions,
        text_preview: textPreview(texts.get(row.turn_id) ?? "", 200),
      });
    }

    return sites.sort((a, b) => b.score - a.score).slice(0, n);
  }
}
