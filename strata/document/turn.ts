export const INTERVIEWER = "Interviewer";
export const RESPONDENT = "Respondent";
export const MONOLOG_SPEAKER = "Speaker";

export type Turn = {
  readonly turn_id: number;
  /** "Interviewer" or any respondent role. */
  readonly speaker: string;
  /** Label as written in the transcript. */
  readonly speaker_label: string;
  readonly text: string;
  readonly sentences: readonly string[];
};

export function wordCount(turn: Pick<Turn, "text">): number {
  return turn.text.split(/\s+/).filter((token) => token.length > 0).length;
}

export function sentenceCount(turn: Pick<Turn, "sentences">): number {
  return turn.sentences.length;
}

// Respondent means "not the interviewer", never equality with one respondent label.
export function isRespondent(turn: Pick<Turn, "speaker">): boolean {
  return turn.speaker !== INTERVIEWER;
}

export function isInterviewer(turn: Pick<Turn, "speaker">): boolean {
  return turn.speaker === INTERVIEWER;
}

export function freezeTurn(turn: Turn): Turn {
  return Object.freeze({
    ...turn,
    sentences: Object.freeze([...turn.sentences]),
  });
}

export function textPreview(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
