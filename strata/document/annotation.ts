import { z } from "zod";

export const ModuleIdSchema = z.enum(["narrative", "position", "discourse", "affect"]);

export const ConfidenceTierSchema = z.enum(["pattern", "syntactic", "researcher"]);

export const AnnotationSchema = z
  .object({
    module: ModuleIdSchema,
    category: z.string().min(1),
    rule_id: z.string().min(1),
    pattern: z.string(),
    matched_text: z.string(),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    sentence: z.string(),
    turn_id: z.number().int().positive(),
    confidence: ConfidenceTierSchema,
    note: z.string(),
    created_at: z.string().min(1),
  })
  .refine((a) => a.start <= a.end, {
    message: "start must not exceed end",
    path: ["start"],
  })
  .refine((a) => a.matched_text.length === a.end - a.start, {
    message: "matched_text length must equal end - start",
    path: ["matched_text"],
  });

export type ModuleId = z.infer<typeof ModuleIdSchema>;
export type ConfidenceTier = z.infer<typeof ConfidenceTierSchema>;
export type Annotation = Readonly<z.infer<typeof AnnotationSchema>>;

export type AnnotationInit = Omit<Annotation, "confidence" | "note" | "created_at"> & {
  confidence?: ConfidenceTier;
  note?: string;
};

/**
 * Builds a frozen annotation. Annotations are never edited after this point.
 */
export function createAnnotation(init: AnnotationInit): Annotation {
  const annotation = AnnotationSchema.parse({
    ...init,
    confidence: init.confidence ?? "pattern",
    note: init.note ?? "",
    created_at: new Date().toISOString(),
  });
  return Object.freeze(annotation);
}

/**
 * Annotation without its timestamp, for comparing two runs.
 */
export function withoutTimestamp(annotation: Annotation): Omit<Annotation, "created_at"> {
  const { created_at: _created_at, ...rest } = annotation;
  return rest;
}
