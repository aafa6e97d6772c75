/**
 * Language capability provider.
 *
 * Optional resources (sentence segmentation, syntactic subject extraction) are
 * probed once per language at construction. Call sites check the flags before
 * using a capability; absence never throws.
 */

export type SentenceSegmenter = (text: string) => string[];

/**
 * A grammatical subject as reported by a dependency parser.
 * Offsets are into the text handed to the extractor.
 */
export type SubjectToken = {
  text: string;
  lemma: string;
  dep: string;
  start: number;
  end: number;
  head_text: string;
  head_pos: string;
  head_children: Array<{ dep: string; text: string }>;
  sentence: string;
};

export type SubjectExtractor = (text: string, language: string) => SubjectToken[];

export type CapabilityLevel = "full" | "light";

export type LanguageCapabilities = {
  language: string;
  level: CapabilityLevel;
  has_sentence_segmenter: boolean;
  has_syntax: boolean;
  segmentSentences: SentenceSegmenter | null;
  extractSubjects: SubjectExtractor | null;
};

export type CapabilityOptions = {
  /** Dependency-parse backed subject extractor, if the caller has one. */
  subjectExtractor?: SubjectExtractor;
  /** Sentence segmenter to use instead of probing the runtime. */
  sentenceSegmenter?: SentenceSegmenter;
  /** Use the runtime's Intl.Segmenter when it supports the locale. Default true. */
  useIntlSegmenter?: boolean;
};

export function regexSplitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

function probeIntlSegmenter(language: string): SentenceSegmenter | null {
  try {
    if (typeof Intl.Segmenter !== "function") return null;
    if (Intl.Segmenter.supportedLocalesOf([language]).length === 0) return null;
    const segmenter = new Intl.Segmenter(language, { granularity: "sentence" });
    return (text: string) =>
      Array.from(segmenter.segment(text), (part) => part.segment.trim()).filter(Boolean);
  } catch {
    // A RangeError for a malformed language tag means the capability is absent.
    return null;
  }
}

export function createLanguageCapabilities(
  language: string,
  options: CapabilityOptions = {}
): LanguageCapabilities {
  const segmentSentences =
    options.sentenceSegmenter ??
    (options.useIntlSegmenter === false ? null : probeIntlSegmenter(language));
  const extractSubjects = options.subjectExtractor ?? null;

  return {
    language,
    level: extractSubjects ? "full" : "light",
    has_sentence_segmenter: segmentSentences !== null,
    has_syntax: extractSubjects !== null,
    segmentSentences,
    extractSubjects,
  };
}

/** Pattern-only provider. */
export function lightCapabilities(language: string): LanguageCapabilities {
  return createLanguageCapabilities(language, { useIntlSegmenter: false });
}

export function capabilityReport(capabilities: LanguageCapabilities) {
  return {
    language: capabilities.language,
    level: capabilities.level,
    sentence_segmenter: capabilities.has_sentence_segmenter,
    syntax: capabilities.has_syntax,
  };
}

/**
 * One capability value per language, probed on first request and reused.
 */
export class CapabilityRegistry {
  private readonly byLanguage = new Map<string, LanguageCapabilities>();

  constructor(private readonly options: CapabilityOptions = {}) {}

  for(language: string): LanguageCapabilities {
    const existing = this.byLanguage.get(language);
    if (existing) return existing;
    const capabilities = createLanguageCapabilities(language, this.options);
    this.byLanguage.set(language, capabilities);
    return capabilities;
  }
}
