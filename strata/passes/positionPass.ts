import { computeDensity } from "../annotate/density.js";
import { Annotation, createAnnotation } from "../document/annotation.js";
import { Document } from "../document/document.js";
import { Turn, wordCount } from "../document/turn.js";
import { CATEGORY_PREFIX, NONE } from "../framebook/categoryKeys.js";
import { LanguageCapabilities, SubjectToken } from "../language/languageCapabilities.js";
import { AnalyticPass, countBy, PassContext } from "./analyticPass.js";

export type SubjectClass = "SELF" | "WE" | "GENERIC" | "OTHER";
export type Voice = "ACTIVE" | "PASSIVE" | "MODAL";

export type PositionTurnSummary = {
  turn_id: number;
  word_count: number;
  pronouns: Record<string, number>;
  agency: Record<string, number>;
  syntactic: Record<string, number>;
  dominant_agency: string;
  agency_density: number;
};

const SUBJECT_DEPS = new Set(["sb", "nsubj", "nsubj:pass"]);
const SELF_FORMS = new Set(["ich", "i", "je", "yo"]);
const WE_FORMS = new Set(["wir", "we", "nous"]);
const GENERIC_FORMS = new Set(["man", "one", "on"]);
const MODAL_AUX = new Set([
  "muss",
  "müssen",
  "kann",
  "können",
  "soll",
  "sollte",
  "must",
  "can",
  "should",
]);

export function classifySubject(token: Pick<SubjectToken, "text">): SubjectClass {
  const lower = token.text.toLowerCase();
  if (SELF_FORMS.has(lower)) return "SELF";
  if (WE_FORMS.has(lower)) return "WE";
  if (GENERIC_FORMS.has(lower)) return "GENERIC";
  return "OTHER";
}

export function classifyVoice(token: SubjectToken): Voice {
  const passive =
    token.dep === "nsubj:pass" || token.head_children.some((child) => child.dep === "auxpass");
  if (passive) return "PASSIVE";
  const modal =
    token.head_pos === "AUX" ||
    token.head_children.some(
      (child) => child.dep === "aux" && MODAL_AUX.has(child.text.toLowerCase())
    );
  return modal ? "MODAL" : "ACTIVE";
}

/**
 * Subject positioning: pronoun use, agency markers and, where a parser is
 * available, who the grammatical subjects are and in which voice.
 */
export class PositionPass implements AnalyticPass<PositionTurnSummary> {
  readonly module = "position" as const;

  constructor(private readonly ctx: PassContext) {}

  analyze(document: Document): number {
    const { annotator, catalog, diagnostics } = this.ctx;
    const language = document.language;
    const pronouns = catalog.pronounsFor(language);
    const capabilities = this.ctx.capabilities.for(language);
    if (!capabilities.has_syntax) {
      diagnostics.once(`syntax:${language}`, {
        code: "syntax_unavailable",
        message: `No syntactic subject extractor for '${language}'; positioning is pattern-only`,
        context: { language },
      });
    }

    const annotations: Annotation[] = [];
    for (const turn of document.getRespondentTurns()) {
      for (const pronoun of pronouns) {
        annotations.push(
          ...annotator.annotate({
            module: this.module,
            category: `${CATEGORY_PREFIX.PRONOUN}${pronoun.label}`,
            patterns: pronoun.patterns,
            text: turn.text,
            turn_id: turn.turn_id,
            rule_prefix: `pron_${pronoun.label.toLowerCase()}`,
          })
        );
      }

      for (const agency of catalog.categories("agency")) {
        annotations.push(
          ...annotator.annotate({
            module: this.module,
            category: agency,
            patterns: catalog.patternsFor("agency", agency, language),
            text: turn.text,
            turn_id: turn.turn_id,
            rule_prefix: `agency_${agency.toLowerCase()}`,
          })
        );
      }

      annotations.push(...this.syntacticAnnotations(document, turn, capabilities));
    }

    return document.addAnnotations(annotations);
  }

  private syntacticAnnotations(
    document: Document,
    turn: Turn,
    capabilities: LanguageCapabilities
  ): Annotation[] {
    if (!capabilities.has_syntax || !capabilities.extractSubjects) return [];

    let tokens: SubjectToken[];
    try {
      tokens = capabilities.extractSubjects(turn.text, document.language);
    } catch (err) {
      this.ctx.diagnostics.warn({
        code: "syntax_failed",
        message: `Subject extraction failed, turn kept pattern-only: ${
          err instanceof Error ? err.message : String(err)
        }`,
        doc_id: document.doc_id,
        context: { turn_id: turn.turn_id },
      });
      return [];
    }

    const annotations: Annotation[] = [];
    for (const token of tokens) {
      if (!SUBJECT_DEPS.has(token.dep)) continue;
      // Spans that do not match the turn text would break the audit trail.
      if (turn.text.slice(token.start, token.end) !== token.text) continue;

      const subject = classifySubject(token);
      const voice = classifyVoice(token);
      annotations.push(
        createAnnotation({
          module: this.module,
          category: `${CATEGORY_PREFIX.SYNTACTIC}${subject}_${voice}`,
          rule_id: `syntactic_subj_${subject.toLowerCase()}_${voice.toLowerCase()}`,
          pattern: `dep=${token.dep}, head=${token.head_text}`,
          matched_text: token.text,
          start: token.start,
          end: token.end,
          sentence: token.sentence,
          turn_id: turn.turn_id,
          confidence: "syntactic",
          note: `head: ${token.head_text}`,
        })
      );
    }
    return annotations;
  }

  /**
   * Agency category with the highest count; ties go to the earlier category in
   * configuration order.
   */
  dominantAgency(counts: Record<string, number>): string {
    let dominant = NONE;
    let best = 0;
    for (const agency of this.ctx.catalog.categories("agency")) {
      const count = counts[agency] ?? 0;
      if (count > best) {
        dominant = agency;
        best = count;
      }
    }
    return dominant;
  }

  summarize(document: Document): PositionTurnSummary[] {
    const agencyNames = new Set(this.ctx.catalog.categories("agency"));

    return document.getRespondentTurns().map((turn) => {
      const own = document.getAnnotations({ module: this.module, turn_id: turn.turn_id });
      const categories = own.map((a) => a.category);

      const pronouns = countBy(
        categories
          .filter((c) => c.startsWith(CATEGORY_PREFIX.PRONOUN))
          .map((c) => c.slice(CATEGORY_PREFIX.PRONOUN.length))
      );
      const agency = countBy(categories.filter((c) => agencyNames.has(c)));
      const syntactic = countBy(categories.filter((c) => c.startsWith(CATEGORY_PREFIX.SYNTACTIC)));
      const agencyTotal = Object.values(agency).reduce((sum, n) => sum + n, 0);
      const words = wordCount(turn);

      return {
        turn_id: turn.turn_id,
        word_count: words,
        pronouns,
        agency,
        syntactic,
        dominant_agency: this.dominantAgency(agency),
        agency_density: computeDensity(agencyTotal, words),
      };
    });
  }
}
