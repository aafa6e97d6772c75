import { computeDensity } from "../annotate/density.js";
import { Annotation } from "../document/annotation.js";
import { Document } from "../document/document.js";
import { wordCount } from "../document/turn.js";
import { CATEGORY_PREFIX, NONE } from "../framebook/categoryKeys.js";
import { FrameConflict } from "../framebook/framebook.schema.js";
import { AnalyticClaim, AnalyticPass, byStrength, countBy, PassContext } from "./analyticPass.js";

export type DiscourseTurnSummary = {
  turn_id: number;
  /** Raw counts, kept for audit. */
  frames: Record<string, number>;
  /** Counts after conflict downweighting; used for dominance. */
  frames_adjusted: Record<string, number>;
  topoi: Record<string, number>;
  dominant_frame: string;
  active_frame_count: number;
  frame_density: number;
};

export type DiscourseClaimType =
  | "COOCCURRENCE"
  | "TRAJECTORY_SHIFT"
  | "TRAJECTORY_GROWING"
  | "TRAJECTORY_SHRINKING"
  | "TENSION"
  | "DOMINANCE";

export type DiscourseClaim = AnalyticClaim & {
  type: DiscourseClaimType;
  frames: string[];
};

/**
 * Scales target counts whose trigger frame is present. Raw counts are not touched.
 */
export function applyConflicts(
  counts: Record<string, number>,
  conflicts: readonly FrameConflict[]
): Record<string, number> {
  const adjusted: Record<string, number> = { ...counts };
  for (const rule of conflicts) {
    if ((counts[rule.trigger_frame] ?? 0) >= 1 && rule.target_frame in adjusted) {
      adjusted[rule.target_frame] *= rule.downweight_factor;
    }
  }
  return adjusted;
}

/**
 * Highest adjusted count, then higher priority, then frame name.
 */
export function dominantFrame(
  adjusted: Record<string, number>,
  priorityOf: (frame: string) => number
): string {
  const ranked = Object.keys(adjusted).sort(
    (a, b) =>
      adjusted[b] - adjusted[a] || priorityOf(b) - priorityOf(a) || a.localeCompare(b)
  );
  return ranked[0] ?? NONE;
}

const sum = (values: Iterable<number>): number => {
  let total = 0;
  for (const value of values) total += value;
  return total;
};

const formatCounts = (counts: Record<string, number>): string =>
  Object.entries(counts)
    .map(([frame, n]) => `${frame}: ${Number.isInteger(n) ? n : n.toFixed(1)}`)
    .join(", ");

/**
 * Discourse framing: frames and topoi per turn, conflict-weighted dominance,
 * and claims about how frames combine and move across the interview.
 */
export class DiscoursePass implements AnalyticPass<DiscourseTurnSummary> {
  readonly module = "discourse" as const;

  constructor(private readonly ctx: PassContext) {}

  private get conflicts(): FrameConflict[] {
    return this.ctx.catalog.framebook.frame_conflicts;
  }

  private priorityOf = (frame: string): number =>
    this.ctx.catalog.priorityOf(frame, this.ctx.policy.discourse.default_priority);

  analyze(document: Document): number {
    const { annotator, catalog } = this.ctx;
    const language = document.language;
    const annotations: Annotation[] = [];

    for (const turn of document.getRespondentTurns()) {
      for (const frame of catalog.categories("frames")) {
        annotations.push(
          ...annotator.annotate({
            module: this.module,
            category: frame,
            patterns: catalog.patternsFor("frames", frame, language),
            text: turn.text,
            turn_id: turn.turn_id,
            rule_prefix: `frame_${frame.toLowerCase()}`,
          })
        );
      }
      for (const topos of catalog.categories("topoi")) {
        annotations.push(
          ...annotator.annotate({
            module: this.module,
            category: `${CATEGORY_PREFIX.TOPOS}${topos}`,
            patterns: catalog.patternsFor("topoi", topos, language),
            text: turn.text,
            turn_id: turn.turn_id,
            rule_prefix: `topos_${topos.toLowerCase()}`,
          })
        );
      }
    }

    return document.addAnnotations(annotations);
  }

  summarize(document: Document): DiscourseTurnSummary[] {
    return document.getRespondentTurns().map((turn) => {
      const own = document.getAnnotations({ module: this.module, turn_id: turn.turn_id });
      const isTopos = (category: string) => category.startsWith(CATEGORY_PREFIX.TOPOS);
      const frames = countBy(own.map((a) => a.category).filter((c) => !isTopos(c)));
      const topoi = countBy(own.map((a) => a.category).filter(isTopos));
      const adjusted = applyConflicts(frames, this.conflicts);

      return {
        turn_id: turn.turn_id,
        frames,
        frames_adjusted: adjusted,
        topoi,
        dominant_frame: dominantFrame(adjusted, this.priorityOf),
        active_frame_count: Object.keys(frames).length,
        frame_density: computeDensity(sum(Object.values(frames)), wordCount(turn)),
      };
    });
  }

  claims(document: Document): DiscourseClaim[] {
    const summary = this.summarize(document);
    return byStrength([
      ...this.cooccurrenceClaims(summary),
      ...this.trajectoryClaims(summary),
      ...this.tensionClaims(summary),
      ...this.dominanceClaims(summary),
    ]);
  }

  private cooccurrenceClaims(summary: DiscourseTurnSummary[]): DiscourseClaim[] {
    const pairTurns = new Map<string, { frames: [string, string]; turns: number[] }>();

    for (const row of summary) {
      const present = Object.keys(row.frames).sort((a, b) => a.localeCompare(b));
      for (let i = 0; i < present.length; i++) {
        for (let j = i + 1; j < present.length; j++) {
          const key = `${present[i]}|${present[j]}`;
          const entry = pairTurns.get(key) ?? { frames: [present[i], present[j]], turns: [] };
          entry.turns.push(row.turn_id);
          pairTurns.set(key, entry);
        }
      }
    }

    const claims: DiscourseClaim[] = [];
    for (const { frames, turns } of pairTurns.values()) {
      if (turns.length < this.ctx.policy.discourse.cooccurrence_min_turns) continue;
      const [a, b] = frames;
      claims.push({
        type: "COOCCURRENCE",
        description: `Frames ${a} and ${b} occur together in ${turns.length} turns`,
        evidence: `Turns: ${turns.join(", ")}`,
        turns,
        frames: [a, b],
        strength: turns.length,
        check_question: `Are ${a} and ${b} systematically linked? Do they reinforce each other or pull apart?`,
      });
    }
    return claims;
  }

  private trajectoryClaims(summary: DiscourseTurnSummary[]): DiscourseClaim[] {
    if (summary.length < 3) return [];
    const third = Math.floor(summary.length / 3);
    const totals = (rows: DiscourseTurnSummary[]) => {
      const out: Record<string, number> = {};
      for (const row of rows) {
        for (const [frame, n] of Object.entries(row.frames)) out[frame] = (out[frame] ?? 0) + n;
      }
      return out;
    };
    const first = totals(summary.slice(0, third));
    const last = totals(summary.slice(summary.length - third));

    const onlyFirst = Object.keys(first).filter((f) => !(f in last));
    const onlyLast = Object.keys(last).filter((f) => !(f in first));
    const claims: DiscourseClaim[] = [];

    if (onlyFirst.length > 0 || onlyLast.length > 0) {
      claims.push({
        type: "TRAJECTORY_SHIFT",
        description: "Frame shift across the interview",
        evidence: `First third: {${formatCounts(first)}}. Last third: {${formatCounts(last)}}.`,
        turns: [],
        frames: [...onlyFirst, ...onlyLast],
        strength: onlyFirst.length + onlyLast.length,
        check_question:
          "Does the shift coincide with a narrative turning point or a change in agency?",
      });
    }

    const margin = this.ctx.policy.discourse.trajectory_min_difference;
    const all = [...new Set([...Object.keys(first), ...Object.keys(last)])].sort((a, b) =>
      a.localeCompare(b)
    );
    for (const frame of all) {
      const a = first[frame] ?? 0;
      const e = last[frame] ?? 0;
      if (e > a + margin) {
        claims.push({
          type: "TRAJECTORY_GROWING",
          description: `Frame ${frame} grows over the interview (${a} -> ${e})`,
          evidence: `First third: ${a}, last third: ${e}`,
          turns: [],
          frames: [frame],
          strength: e - a,
          check_question: `Why does ${frame} gain weight? A response to the questions or an inner dynamic?`,
        });
      } else if (a > e + margin) {
        claims.push({
          type: "TRAJECTORY_SHRINKING",
          description: `Frame ${frame} recedes over the interview (${a} -> ${e})`,
          evidence: `First third: ${a}, last third: ${e}`,
          turns: [],
          frames: [frame],
          strength: a - e,
          check_question: `Why does ${frame} lose presence? Is it replaced by another frame?`,
        });
      }
    }
    return claims;
  }

  private tensionClaims(summary: DiscourseTurnSummary[]): DiscourseClaim[] {
    const claims: DiscourseClaim[] = [];
    for (const tension of this.ctx.catalog.framebook.frame_tensions) {
      const { frame_a, frame_b } = tension;
      const turns = summary
        .filter((row) => frame_a in row.frames && frame_b in row.frames)
        .map((row) => row.turn_id);
      if (turns.length === 0) continue;
      claims.push({
        type: "TENSION",
        description: `Frame tension: ${tension.description || `${frame_a} vs. ${frame_b}`}`,
        evidence: `Both frames co-occur in turns: ${turns.join(", ")}`,
        turns,
        frames: [frame_a, frame_b],
        strength: turns.length,
        check_question: `How does the respondent handle the tension between ${frame_a} and ${frame_b}: resolving, enduring or avoiding it?`,
      });
    }
    return claims;
  }

  private dominanceClaims(summary: DiscourseTurnSummary[]): DiscourseClaim[] {
    const raw: Record<string, number> = {};
    for (const row of summary) {
      for (const [frame, n] of Object.entries(row.frames)) raw[frame] = (raw[frame] ?? 0) + n;
    }
    if (Object.keys(raw).length === 0) return [];

    const adjusted = applyConflicts(raw, this.conflicts);
    const adjustedTotal = sum(Object.values(adjusted));
    if (adjustedTotal === 0) return [];

    const dominant = dominantFrame(adjusted, this.priorityOf);
    const share = adjusted[dominant] / adjustedTotal;
    if (share <= this.ctx.policy.discourse.dominance_share) return [];

    const pct = Math.round(share * 100);
    const rawDominant = dominantFrame(raw, this.priorityOf);
    const rawPct = Math.round((raw[rawDominant] / sum(Object.values(raw))) * 100);
    const note =
      rawDominant !== dominant
        ? ` (without conflict weighting ${rawDominant} would dominate with ${rawPct}%)`
        : "";

    return [
      {
        type: "DOMINANCE",
        description: `Frame ${dominant} dominates the interview (${pct}% of weighted frame markers)${note}`,
        evidence: `Raw: {${formatCounts(raw)}} | Adjusted: {${formatCounts(adjusted)}}`,
        turns: [],
        frames: rawDominant !== dominant ? [dominant, rawDominant] : [dominant],
        strength: pct,
        check_question: `Is ${dominant} the respondent's central interpretive frame, or an artefact of the interview guide?`,
      },
    ];
  }
}
