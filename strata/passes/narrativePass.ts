import { Annotation } from "../document/annotation.js";
import { Document } from "../document/document.js";
import { textPreview, Turn } from "../document/turn.js";
import { CATEGORY_PREFIX, PROCESS_STRUCTURE, UNDETERMINED } from "../framebook/categoryKeys.js";
import { AnalyticPass, PassContext } from "./analyticPass.js";

export type NarrativeTurnSummary = {
  turn_id: number;
  sentence_count: number;
  type_sequence: string[];
  /** First letters of the sequence, e.g. "NAAD". */
  sequence_short: string;
  transitions: number;
  process_structures: string[];
  annotation_count: number;
};

export type TurningPointCandidate = {
  turn_id: number;
  score: number;
  reasons: string[];
  type_sequence: string[];
  text_preview: string;
};

/** Adjacent positions that differ, neither undetermined. */
export function countTransitions(sequence: readonly string[]): number {
  let transitions = 0;
  for (let i = 1; i < sequence.length; i++) {
    const prev = sequence[i - 1];
    const next = sequence[i];
    if (prev !== next && prev !== UNDETERMINED && next !== UNDETERMINED) {
      transitions += 1;
    }
  }
  return transitions;
}

/**
 * Narrative structure: discourse type per sentence, process structures per turn.
 */
export class NarrativePass implements AnalyticPass<NarrativeTurnSummary> {
  readonly module = "narrative" as const;

  constructor(private readonly ctx: PassContext) {}

  /**
   * The discourse type with strictly the most matches; ties keep the earlier
   * type in configuration order.
   */
  classifySentence(sentence: string, language: string): string {
    const { annotator, catalog } = this.ctx;
    let best = UNDETERMINED;
    let bestCount = 0;
    for (const type of catalog.categories("discourse_types")) {
      const patterns = catalog.patternsFor("discourse_types", type, language);
      const count = annotator.countMatches(sentence, patterns);
      if (count > bestCount) {
        best = type;
        bestCount = count;
      }
    }
    return best;
  }

  typeSequence(turn: Turn, language: string): string[] {
    return turn.sentences.map((sentence) => this.classifySentence(sentence, language));
  }

  analyze(document: Document): number {
    const { annotator, catalog, diagnostics } = this.ctx;
    const language = document.language;
    const annotations: Annotation[] = [];

    for (const turn of document.getRespondentTurns()) {
      let cursor = 0;
      for (const sentence of turn.sentences) {
        const type = this.classifySentence(sentence, language);
        let at = turn.text.indexOf(sentence, cursor);
        if (at === -1) at = turn.text.indexOf(sentence);
        if (at === -1) {
          diagnostics.warn({
            code: "sentence_not_located",
            message: `Sentence not found in turn text; discourse type ${type} not annotated`,
            doc_id: document.doc_id,
            context: { turn_id: turn.turn_id },
          });
          continue;
        }
        cursor = at + sentence.length;
        if (type === UNDETERMINED) continue;

        annotations.push(
          ...annotator.annotate({
            module: this.module,
            category: `${CATEGORY_PREFIX.TYPE}${type}`,
            patterns: catalog.patternsFor("discourse_types", type, language),
            text: sentence,
            offset: at,
            sentence,
            turn_id: turn.turn_id,
            rule_prefix: `type_${type.toLowerCase()}`,
          })
        );
      }

      for (const structure of catalog.categories("process_structures")) {
        annotations.push(
          ...annotator.annotate({
            module: this.module,
            category: structure,
            patterns: catalog.patternsFor("process_structures", structure, language),
            text: turn.text,
            turn_id: turn.turn_id,
            rule_prefix: `ps_${structure.toLowerCase()}`,
          })
        );
      }
    }

    return document.addAnnotations(annotations);
  }

  summarize(document: Document): NarrativeTurnSummary[] {
    return document.getRespondentTurns().map((turn) => {
      const sequence = this.typeSequence(turn, document.language);
      const own = document.getAnnotations({ module: this.module, turn_id: turn.turn_id });
      const structures = new Set(
        own.filter((a) => !a.category.startsWith(CATEGORY_PREFIX.TYPE)).map((a) => a.category)
      );

      return {
        turn_id: turn.turn_id,
        sentence_count: turn.sentences.length,
        type_sequence: sequence,
        sequence_short: sequence.map((type) => type.charAt(0)).join(""),
        transitions: countTransitions(sequence),
        process_structures: [...structures].sort((a, b) => a.localeCompare(b)),
        annotation_count: own.length,
      };
    });
  }

  /**
   * Turns where discourse types switch and process structures overlap.
   */
  turningPoints(document: Document, n = this.ctx.policy.top_n): TurningPointCandidate[] {
    const weights = this.ctx.policy.narrative;
    const turns = new Map(document.getRespondentTurns().map((turn) => [turn.turn_id, turn]));
    const candidates: TurningPointCandidate[] = [];

    for (const row of this.summarize(document)) {
      let score = 0;
      const reasons: string[] = [];

      if (row.transitions > 0) {
        score += row.transitions * weights.transition_weight;
        reasons.push(`${row.transitions} discourse-type transitions`);
      }

      const structures = row.process_structures;
      if (structures.length > 1) {
        score += structures.length * weights.overlap_weight;
        reasons.push(`Overlapping process structures: ${structures.join(", ")}`);
      } else if (structures.length === 1) {
        score += weights.single_structure_bonus;
        reasons.push(`Process structure: ${structures[0]}`);
      }

      if (structures.includes(PROCESS_STRUCTURE.TRAJECTORY)) {
        score += weights.trajectory_bonus;
        reasons.push("Trajectory structure present");
      }

      if (score > 0) {
        candidates.push({
          turn_id: row.turn_id,
          score,
          reasons,
          type_sequence: row.type_sequence,
          text_preview: textPreview(turns.get(row.turn_id)?.text ?? "", 200),
        });
      }
    }

    return candidates.sort((a, b) => b.score - a.score).slice(0, n);
  }
}
