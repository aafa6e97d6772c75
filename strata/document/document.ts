import { AnnotationSpanError, UnknownTurnError } from "../errors.js";
import { Annotation, ModuleId } from "./annotation.js";
import {
  freezeTurn,
  isInterviewer,
  isRespondent,
  sentenceCount,
  Turn,
  wordCount,
} from "./turn.js";

export type ParseMode = "dialog" | "monolog" | "manual";

export type DocumentMetadata = {
  parse_mode: ParseMode;
  detected_speakers: string[];
  speaker_mapping: Record<string, string>;
  fingerprint: string;
};

export type DocumentInit = {
  doc_id: string;
  language: string;
  raw_text: string;
  turns: Turn[];
  metadata: DocumentMetadata;
};

export type AnnotationFilter = {
  module?: ModuleId;
  category?: string;
  turn_id?: number;
};

export type DocumentSummary = {
  doc_id: string;
  language: string;
  turn_count: number;
  interviewer_turn_count: number;
  respondent_turn_count: number;
  sentence_count: number;
  word_count: number;
  annotation_count: number;
  annotations_per_module: Partial<Record<ModuleId, number>>;
  parse_mode: ParseMode;
  detected_speakers: string[];
  speaker_mapping: Record<string, string>;
};

/**
 * One interview. Turns are fixed at construction; annotations only grow.
 * `revision` increases with every append so derived views can tell when they are stale.
 */
export class Document {
  readonly doc_id: string;
  readonly language: string;
  readonly raw_text: string;
  readonly turns: readonly Turn[];
  readonly metadata: Readonly<DocumentMetadata>;

  private readonly annotationLog: Annotation[] = [];
  private readonly turnIndex: Map<number, Turn>;
  private revisionCounter = 0;

  constructor(init: DocumentInit) {
    init.turns.forEach((turn, idx) => {
      if (turn.turn_id !== idx + 1) {
        throw new Error(
          `Turn ids must be 1-based and contiguous (expected ${idx + 1}, got ${turn.turn_id})`
        );
      }
    });

    this.doc_id = init.doc_id;
    this.language = init.language;
    this.raw_text = init.raw_text;
    this.turns = Object.freeze(init.turns.map(freezeTurn));
    this.metadata = Object.freeze({ ...init.metadata });
    this.turnIndex = new Map(this.turns.map((turn) => [turn.turn_id, turn]));
  }

  get revision(): number {
    return this.revisionCounter;
  }

  get annotations(): readonly Annotation[] {
    return [...this.annotationLog];
  }

  get annotationCount(): number {
    return this.annotationLog.length;
  }

  getTurn(turn_id: number): Turn {
    const turn = this.turnIndex.get(turn_id);
    if (!turn) throw new UnknownTurnError(this.doc_id, turn_id);
    return turn;
  }

  getRespondentTurns(): Turn[] {
    return this.turns.filter(isRespondent);
  }

  getInterviewerTurns(): Turn[] {
    return this.turns.filter(isInterviewer);
  }

  getAnnotations(filter: AnnotationFilter = {}): Annotation[] {
    return this.annotationLog.filter(
      (a) =>
        (filter.module === undefined || a.module === filter.module) &&
        (filter.category === undefined || a.category === filter.category) &&
        (filter.turn_id === undefined || a.turn_id === filter.turn_id)
    );
  }

  /**
   * Appends annotations after checking every span against its turn text.
   * Either all are appended or none.
   */
  addAnnotations(annotations: readonly Annotation[]): number {
    for (const annotation of annotations) {
      this.assertSpan(annotation);
    }
    if (annotations.length === 0) return 0;
    this.annotationLog.push(...annotations);
    this.revisionCounter += 1;
    return annotations.length;
  }

  summary(): DocumentSummary {
    const perModule: Partial<Record<ModuleId, number>> = {};
    for (const annotation of this.annotationLog) {
      perModule[annotation.module] = (perModule[annotation.module] ?? 0) + 1;
    }

    return {
      doc_id: this.doc_id,
      language: this.language,
      turn_count: this.turns.length,
      interviewer_turn_count: this.getInterviewerTurns().length,
      respondent_turn_count: this.getRespondentTurns().length,
      sentence_count: this.turns.reduce((sum, turn) => sum + sentenceCount(turn), 0),
      word_count: this.turns.reduce((sum, turn) => sum + wordCount(turn), 0),
      annotation_count: this.annotationLog.length,
      annotations_per_module: perModule,
      parse_mode: this.metadata.parse_mode,
      detected_speakers: [...this.metadata.detected_speakers],
      speaker_mapping: { ...this.metadata.speaker_mapping },
    };
  }

  private assertSpan(annotation: Annotation): void {
    const turn = this.turnIndex.get(annotation.turn_id);
    if (!turn) throw new UnknownTurnError(this.doc_id, annotation.turn_id);

    if (annotation.end > turn.text.length) {
      throw new AnnotationSpanError(
        annotation.rule_id,
        annotation.turn_id,
        `end ${annotation.end} exceeds text length ${turn.text.length}`
      );
    }
    const slice = turn.text.slice(annotation.start, annotation.end);
    if (slice !== annotation.matched_text) {
      throw new AnnotationSpanError(
        annotation.rule_id,
        annotation.turn_id,
        `matched_text "${annotation.matched_text}" != "${slice}"`
      );
    }
  }
}
