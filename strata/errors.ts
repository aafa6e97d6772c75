/**
 * Fatal error model.
 * Non-fatal conditions go through Diagnostics instead.
 */

export class FramebookNotFoundError extends Error {
  constructor(public filePath: string) {
    super(`Framebook not found: ${filePath}`);
    this.name = "FramebookNotFoundError";
  }
}

export class FramebookParseError extends Error {
  constructor(public filePath: string, detail: string) {
    super(`Failed to parse framebook JSON (${filePath}): ${detail}`);
    this.name = "FramebookParseError";
  }
}

export class FramebookSchemaError extends Error {
  constructor(public filePath: string, detail: string) {
    super(`Framebook schema validation failed for ${filePath}: ${detail}`);
    this.name = "FramebookSchemaError";
  }
}

export class AnnotationSpanError extends Error {
  constructor(public rule_id: string, public turn_id: number, detail: string) {
    super(`Annotation ${rule_id} violates span invariant on turn ${turn_id}: ${detail}`);
    this.name = "AnnotationSpanError";
  }
}

export class UnknownTurnError extends Error {
  constructor(public doc_id: string, public turn_id: number) {
    super(`Document ${doc_id} has no turn ${turn_id}`);
    this.name = "UnknownTurnError";
  }
}
