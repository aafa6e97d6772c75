import { PatternAnnotator } from "../annotate/patternAnnotator.js";
import { Diagnostics } from "../diagnostics/diagnostics.js";
import { ModuleId } from "../document/annotation.js";
import { Document } from "../document/document.js";
import { PatternCatalog } from "../framebook/patternCatalog.js";
import { CapabilityRegistry } from "../language/languageCapabilities.js";
import { ScoringPolicyV1 } from "../policy/scoringPolicy.v1.js";

/**
 * Shared collaborators of the analytic passes. Passes own no state beyond these.
 */
export type PassContext = {
  annotator: PatternAnnotator;
  catalog: PatternCatalog;
  diagnostics: Diagnostics;
  capabilities: CapabilityRegistry;
  policy: ScoringPolicyV1;
};

/**
 * A pass appends annotations under its own module id and reads only those back.
 */
export interface AnalyticPass<TSummary> {
  readonly module: ModuleId;
  /** Annotates respondent turns; returns the number of annotations appended. */
  analyze(document: Document): number;
  /** One record per respondent turn, in turn order. */
  summarize(document: Document): TSummary[];
}

/**
 * A ranked proposal for the researcher to check against the transcript.
 */
export type AnalyticClaim = {
  type: string;
  description: string;
  evidence: string;
  turns: number[];
  strength: number;
  check_question: string;
};

export function countBy(values: Iterable<string>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

/** Strength descending; equal strengths keep their order. */
export function byStrength<T extends { strength: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => b.strength - a.strength);
}
