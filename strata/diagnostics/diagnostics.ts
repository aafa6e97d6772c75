import { strataLog } from "../../logging/strataLog.js";

export type DiagnosticCode =
  | "framebook_section_missing"
  | "framebook_unknown_frame"
  | "framebook_invalid_factor"
  | "invalid_pattern"
  | "patterns_missing_for_language"
  | "pronouns_missing_for_language"
  | "syntax_unavailable"
  | "syntax_failed"
  | "sentence_not_located"
  | "document_failed";

export type DiagnosticEntry = {
  code: DiagnosticCode;
  message: string;
  doc_id?: string;
  context?: Record<string, string | number>;
};

/**
 * Collects non-fatal degradations so callers (and tests) can see them.
 * `once` suppresses repeats for the same key; every recorded entry is also logged.
 */
export class Diagnostics {
  private readonly items: DiagnosticEntry[] = [];
  private readonly seen = new Set<string>();

  warn(entry: DiagnosticEntry): void {
    this.items.push(entry);
    strataLog(
      {
        event: "diagnostic.recorded",
        code: entry.code,
        message: entry.message,
        doc_id: entry.doc_id,
        ...(entry.context ?? {}),
      },
      "warn"
    );
  }

  once(key: string, entry: DiagnosticEntry): void {
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.warn(entry);
  }

  entries(): DiagnosticEntry[] {
    return [...this.items];
  }

  byCode(code: DiagnosticCode): DiagnosticEntry[] {
    return this.items.filter((entry) => entry.code === code);
  }

  get size(): number {
    return this.items.length;
  }
}
