import { z } from "zod";

/** Patterns per language code, in evaluation order. */
export const LanguagePatternsSchema = z.record(z.array(z.string()));

export const CategorySchema = z.object({
  description: z.string().optional(),
  patterns: LanguagePatternsSchema.default({}),
});

export const CategorySectionSchema = z.record(CategorySchema).default({});

/** Per language: pronoun label → one pattern or several. */
export const PronounSectionSchema = z
  .record(z.record(z.union([z.string(), z.array(z.string())])))
  .default({});

export const FrameConflictSchema = z.object({
  trigger_frame: z.string().min(1),
  target_frame: z.string().min(1),
  downweight_factor: z.number(),
});

export const FrameTensionSchema = z.object({
  frame_a: z.string().min(1),
  frame_b: z.string().min(1),
  description: z.string().default(""),
});

export const FrameRolesSchema = z.object({
  claim: z.array(z.string()).default([]),
  structure: z.array(z.string()).default([]),
  context: z
    .object({
      amplifying: z.array(z.string()).default([]),
      dampening: z.array(z.string()).default([]),
      neutral: z.array(z.string()).default([]),
    })
    .default({}),
});

export const FramebookSchema = z.object({
  version: z.string().default("unversioned"),
  description: z.string().default(""),
  discourse_types: CategorySectionSchema,
  process_structures: CategorySectionSchema,
  pronouns: PronounSectionSchema,
  agency: CategorySectionSchema,
  frames: CategorySectionSchema,
  topoi: CategorySectionSchema,
  affect_dimensions: CategorySectionSchema,
  frame_priorities: z.record(z.number().int()).default({}),
  frame_conflicts: z.array(FrameConflictSchema).default([]),
  frame_tensions: z.array(FrameTensionSchema).default([]),
  frame_roles: FrameRolesSchema.optional(),
});

/**
 * Project overlay. `frames`/`topoi` extend existing categories with extra
 * patterns; `overlay_frames`/`overlay_topoi` add new categories.
 */
export const FramebookOverlaySchema = z.object({
  overlay: z.object({ name: z.string().optional() }).default({}),
  frames: CategorySectionSchema,
  overlay_frames: CategorySectionSchema,
  topoi: CategorySectionSchema,
  overlay_topoi: CategorySectionSchema,
  frame_tensions: z.array(FrameTensionSchema).default([]),
  frame_priorities: z.record(z.number().int()).default({}),
  frame_conflicts: z.array(FrameConflictSchema).default([]),
});

export type CategoryConfig = z.infer<typeof CategorySchema>;
export type CategorySection = z.infer<typeof CategorySectionSchema>;
export type FrameConflict = z.infer<typeof FrameConflictSchema>;
export type FrameTension = z.infer<typeof FrameTensionSchema>;
export type FrameRoles = z.infer<typeof FrameRolesSchema>;
export type Framebook = z.infer<typeof FramebookSchema>;
export type FramebookOverlay = z.infer<typeof FramebookOverlaySchema>;

export const CATEGORY_SECTIONS = [
  "discourse_types",
  "process_structures",
  "agency",
  "frames",
  "topoi",
  "affect_dimensions",
] as const;

export type CategorySectionName = (typeof CATEGORY_SECTIONS)[number];
