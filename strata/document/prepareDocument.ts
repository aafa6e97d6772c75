import { createHash } from "node:crypto";
import { strataLog } from "../../logging/strataLog.js";
import {
  LanguageCapabilities,
  regexSplitSentences,
  SentenceSegmenter,
} from "../language/languageCapabilities.js";
import { Document, DocumentMetadata } from "./document.js";
import { INTERVIEWER, MONOLOG_SPEAKER, RESPONDENT, Turn } from "./turn.js";

export type PrepareOptions = {
  doc_id?: string;
  language?: string;
  /** Explicit label → role mapping; skips automatic classification. */
  speaker_mapping?: Record<string, string>;
  /** Label to treat as interviewer regardless of heuristics. */
  interviewer_label?: string;
  /** Move "…? Name: answer" speaker changes onto their own line. Default true. */
  preprocess?: boolean;
  capabilities?: LanguageCapabilities;
};

export type ManualTurn = {
  speaker: string;
  text: string;
  speaker_label?: string;
};

const SPEAKER_LABEL_PATTERN = /^([A-ZÄÖÜ][A-Za-zäöüßÄÖÜ. \t]{0,30}?):\s/gm;
const INLINE_NAME_PATTERN = /([A-ZÄÖÜ][a-zäöüß]+):\s/g;
const END_OF_INPUT = "(?![\\s\\S])";

const INTERVIEWER_KEYWORDS = new Set([
  "interviewer",
  "interviewerin",
  "int",
  "i",
  "moderator",
  "moderatorin",
  "mod",
  "forscher",
  "forscherin",
  "researcher",
  "fragender",
  "fragende",
  "q",
]);

const RESPONDENT_KEYWORDS = new Set([
  "befragter",
  "befragte",
  "b",
  "respondent",
  "interviewee",
  "teilnehmer",
  "teilnehmerin",
  "participant",
  "p",
  "erzähler",
  "erzählerin",
  "narrator",
  "a",
]);

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const normalizeWhitespace = (value: string): string =>
  value.split(/\s+/).filter(Boolean).join(" ");

export function fingerprint(text: string): string {
  return createHash("md5").update(text, "utf8").digest("hex").slice(0, 12);
}

/**
 * Moves inline speaker changes ("… question? Amara: Answer") to the start of a line.
 * Without known speakers, any capitalized "Name:" seen at least twice counts.
 */
export function preprocessInlineSpeakers(text: string, knownSpeakers?: string[]): string {
  let speakers = knownSpeakers;
  if (!speakers) {
    const counts = new Map<string, number>();
    for (const match of text.matchAll(INLINE_NAME_PATTERN)) {
      counts.set(match[1], (counts.get(match[1]) ?? 0) + 1);
    }
    speakers = [...counts.entries()].filter(([, n]) => n >= 2).map(([name]) => name);
  }

  let result = text;
  for (const speaker of speakers) {
    const pattern = new RegExp(`([.!?])\\s+(${escapeRegExp(speaker)}):\\s`, "g");
    result = result.replace(pattern, "$1\n\n$2: ");
  }
  return result;
}

/**
 * Labels at line starts. Returns null unless at least two distinct labels occur.
 */
export function detectSpeakers(text: string): string[] | null {
  const labels: string[] = [];
  for (const match of text.matchAll(SPEAKER_LABEL_PATTERN)) {
    const label = match[1].trim();
    if (!labels.includes(label)) labels.push(label);
  }
  return labels.length >= 2 ? labels : null;
}

function turnBodiesFor(text: string, label: string, labels: string[]): string[] {
  const others = labels.filter((l) => l !== label).map(escapeRegExp);
  const stop = others.length ? `(?=^(?:${others.join("|")}):\\s|${END_OF_INPUT})` : `(?=${END_OF_INPUT})`;
  const pattern = new RegExp(`^${escapeRegExp(label)}:\\s*([\\s\\S]+?)${stop}`, "gm");
  return Array.from(text.matchAll(pattern), (m) => m[1]);
}

type SpeakerStats = { avg_length: number; question_ratio: number };

/**
 * Interviewer or respondent per label: explicit keywords first, then
 * turn-shape heuristics (interviewers ask more and speak shorter).
 */
export function classifySpeakers(
  text: string,
  labels: string[],
  explicitInterviewer?: string
): Record<string, string> {
  const mapping: Record<string, string> = {};

  for (const label of labels) {
    const lower = label.toLowerCase().trim();
    if (explicitInterviewer && lower === explicitInterviewer.toLowerCase()) {
      mapping[label] = INTERVIEWER;
    } else if (INTERVIEWER_KEYWORDS.has(lower)) {
      mapping[label] = INTERVIEWER;
    } else if (RESPONDENT_KEYWORDS.has(lower)) {
      mapping[label] = RESPONDENT;
    }
  }

  const unclassified = labels.filter((label) => !(label in mapping));
  if (unclassified.length > 0) {
    const stats = new Map<string, SpeakerStats>();
    for (const label of labels) {
      const bodies = turnBodiesFor(text, label, labels);
      if (bodies.length === 0) continue;
      const joined = bodies.join(" ");
      stats.set(label, {
        avg_length: joined.length / bodies.length,
        question_ratio: (joined.match(/\?/g) ?? []).length / bodies.length,
      });
    }

    for (const label of unclassified) {
      const own = stats.get(label);
      if (!own) continue;
      const others = [...stats.entries()].filter(([l]) => l !== label).map(([, s]) => s);
      if (others.length === 0) {
        mapping[label] = Object.values(mapping).includes(INTERVIEWER) ? RESPONDENT : INTERVIEWER;
        continue;
      }
      const avgOtherLength = others.reduce((sum, s) => sum + s.avg_length, 0) / others.length;
      const avgOtherQuestions =
        others.reduce((sum, s) => sum + s.question_ratio, 0) / others.length;

      const looksLikeInterviewer =
        own.avg_length < avgOtherLength * 0.5 ||
        own.question_ratio > avgOtherQuestions * 2 ||
        own.question_ratio > 0.8;

      mapping[label] = looksLikeInterviewer ? INTERVIEWER : RESPONDENT;
    }
  }

  for (const label of labels) {
    if (!(label in mapping)) {
      mapping[label] = Object.values(mapping).includes(INTERVIEWER) ? RESPONDENT : INTERVIEWER;
    }
  }

  return mapping;
}

function parseDialog(
  text: string,
  labels: string[],
  mapping: Record<string, string>,
  split: SentenceSegmenter
): Turn[] {
  const alternatives = [...labels]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  const pattern = new RegExp(
    `^(${alternatives}):\\s*([\\s\\S]+?)(?=^(?:${alternatives}):\\s|${END_OF_INPUT})`,
    "gm"
  );

  const turns: Turn[] = [];
  for (const match of text.matchAll(pattern)) {
    const body = normalizeWhitespace(match[2]);
    turns.push({
      turn_id: turns.length + 1,
      speaker: mapping[match[1]] ?? RESPONDENT,
      speaker_label: match[1],
      text: body,
      sentences: split(body),
    });
  }
  return turns;
}

function parseMonolog(text: string, split: SentenceSegmenter): Turn[] {
  return text
    .split(/\n\s*\n/)
    .map(normalizeWhitespace)
    .filter(Boolean)
    .map((body, idx) => ({
      turn_id: idx + 1,
      speaker: MONOLOG_SPEAKER,
      speaker_label: MONOLOG_SPEAKER,
      text: body,
      sentences: split(body),
    }));
}

function sentenceSplitter(capabilities?: LanguageCapabilities): SentenceSegmenter {
  if (capabilities?.has_sentence_segmenter && capabilities.segmentSentences) {
    return capabilities.segmentSentences;
  }
  return regexSplitSentences;
}

/**
 * Raw transcript → Document with an immutable turn list.
 * Falls back to one turn per paragraph when fewer than two speaker labels are found.
 */
export function prepareDocument(rawText: string, options: PrepareOptions = {}): Document {
  const doc_id = options.doc_id ?? "doc_001";
  const language = options.language ?? "de";
  const split = sentenceSplitter(options.capabilities);

  const text = options.preprocess === false ? rawText : preprocessInlineSpeakers(rawText);
  const labels = detectSpeakers(text);

  let turns: Turn[];
  let speaker_mapping: Record<string, string> = {};
  if (labels) {
    speaker_mapping =
      options.speaker_mapping ?? classifySpeakers(text, labels, options.interviewer_label);
    turns = parseDialog(text, labels, speaker_mapping, split);
  } else {
    turns = parseMonolog(text, split);
  }

  const metadata: DocumentMetadata = {
    parse_mode: labels ? "dialog" : "monolog",
    detected_speakers: labels ?? [],
    speaker_mapping,
    fingerprint: fingerprint(text),
  };

  const document = new Document({ doc_id, language, raw_text: rawText, turns, metadata });

  strataLog(
    {
      event: "document.prepared",
      doc_id,
      parse_mode: metadata.parse_mode,
      turn_count: turns.length,
    },
    "debug"
  );

  return document;
}

/**
 * Document from turns an external preparer already produced.
 */
export function documentFromTurns(params: {
  doc_id: string;
  language: string;
  turns: ManualTurn[];
  capabilities?: LanguageCapabilities;
}): Document {
  const split = sentenceSplitter(params.capabilities);
  const turns: Turn[] = params.turns.map((turn, idx) => {
    const body = normalizeWhitespace(turn.text);
    return {
      turn_id: idx + 1,
      speaker: turn.speaker,
      speaker_label: turn.speaker_label ?? turn.speaker,
      text: body,
      sentences: split(body),
    };
  });

  const raw_text = params.turns.map((t) => `${t.speaker_label ?? t.speaker}: ${t.text}`).join("\n");
  const speaker_mapping: Record<string, string> = {};
  for (const turn of turns) speaker_mapping[turn.speaker_label] = turn.speaker;

  return new Document({
    doc_id: params.doc_id,
    language: params.language,
    raw_text,
    turns,
    metadata: {
      parse_mode: "manual",
      detected_speakers: Object.keys(speaker_mapping),
      speaker_mapping,
      fingerprint: fingerprint(raw_text),
    },
  });
}
