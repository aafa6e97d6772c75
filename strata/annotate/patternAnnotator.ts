import { Diagnostics } from "../diagnostics/diagnostics.js";
import { Annotation, ConfidenceTier, createAnnotation, ModuleId } from "../document/annotation.js";
import { findContainingSentence } from "./findContainingSentence.js";

export type AnnotateRequest = {
  module: ModuleId;
  category: string;
  patterns: readonly string[];
  text: string;
  turn_id: number;
  rule_prefix: string;
  /** Added to every offset when `text` is a slice of the turn text. */
  offset?: number;
  /** Fixed containing sentence for sentence-scoped scans. */
  sentence?: string;
  confidence?: ConfidenceTier;
};

export type PatternMatch = {
  pattern: string;
  pattern_index: number;
  matched_text: string;
  start: number;
  end: number;
};

const WORD_CHARS = "\\p{L}\\p{N}_";
const WORD_CLASS = `[${WORD_CHARS}]`;
const WORD_BOUNDARY = `(?:(?<=${WORD_CLASS})(?!${WORD_CLASS})|(?<!${WORD_CLASS})(?=${WORD_CLASS}))`;
const NOT_WORD_BOUNDARY = `(?:(?<=${WORD_CLASS})(?=${WORD_CLASS})|(?<!${WORD_CLASS})(?!${WORD_CLASS}))`;

/**
 * Rewrites `\b`, `\B`, `\w` and `\W` so letters outside ASCII (umlauts, ß)
 * count as word characters. Inside a character class only `\w` is rewritten.
 */
export function unicodeWordPattern(pattern: string): string {
  let out = "";
  let inClass = false;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "\\" && i + 1 < pattern.length) {
      const next = pattern[++i];
      if (next === "w") out += inClass ? WORD_CHARS : WORD_CLASS;
      else if (inClass) out += ch + next;
      else if (next === "b") out += WORD_BOUNDARY;
      else if (next === "B") out += NOT_WORD_BOUNDARY;
      else if (next === "W") out += `[^${WORD_CHARS}]`;
      else out += ch + next;
      continue;
    }
    if (ch === "[" && !inClass) inClass = true;
    else if (ch === "]" && inClass) inClass = false;
    out += ch;
  }
  return out;
}

export function ruleId(prefix: string, index: number): string {
  return `${prefix}_${String(index).padStart(2, "0")}`;
}

/**
 * The one place regex matches become annotations. Matching ignores case,
 * spans keep the original casing.
 */
export class PatternAnnotator {
  private readonly compiled = new Map<string, RegExp | null>();

  constructor(private readonly diagnostics: Diagnostics) {}

  private compile(pattern: string): RegExp | null {
    const cached = this.compiled.get(pattern);
    if (cached !== undefined) return cached;

    let regex: RegExp | null;
    try {
      regex = new RegExp(unicodeWordPattern(pattern), "giu");
    } catch (err) {
      regex = null;
      this.diagnostics.once(`pattern:${pattern}`, {
        code: "invalid_pattern",
        message: `Invalid pattern skipped: ${err instanceof Error ? err.message : String(err)}`,
        context: { pattern },
      });
    }
    this.compiled.set(pattern, regex);
    return regex;
  }

  /** All matches, pattern by pattern, each pattern's matches left to right. */
  findMatches(text: string, patterns: readonly string[]): PatternMatch[] {
    const matches: PatternMatch[] = [];
    patterns.forEach((pattern, pattern_index) => {
      const regex = this.compile(pattern);
      if (!regex) return;
      for (const match of text.matchAll(regex)) {
        const start = match.index ?? 0;
        matches.push({
          pattern,
          pattern_index,
          matched_text: match[0],
          start,
          end: start + match[0].length,
        });
      }
    });
    return matches;
  }

  countMatches(text: string, patterns: readonly string[]): number {
    return this.findMatches(text, patterns).length;
  }

  annotate(request: AnnotateRequest): Annotation[] {
    const offset = request.offset ?? 0;
    return this.findMatches(request.text, request.patterns).map((match) =>
      createAnnotation({
        module: request.module,
        category: request.category,
        rule_id: ruleId(request.rule_prefix, match.pattern_index),
        pattern: match.pattern,
        matched_text: match.matched_text,
        start: match.start + offset,
        end: match.end + offset,
        sentence: request.sentence ?? findContainingSentence(request.text, match.start),
        turn_id: request.turn_id,
        confidence: request.confidence ?? "pattern",
      })
    );
  }
}
