import { DiagnosticCode } from "../diagnostics/diagnostics.js";
import { Framebook } from "./framebook.schema.js";

export type FramebookWarning = {
  code: DiagnosticCode;
  message: string;
};

const REQUIRED_SECTIONS = [
  "discourse_types",
  "process_structures",
  "frames",
  "affect_dimensions",
] as const;

/**
 * Semantic checks the schema cannot express. Rules naming undeclared frames
 * stay in place (they simply never fire); conflict rules whose factor lies
 * outside [0, 1] are removed.
 */
export function validateFramebook(framebook: Framebook): {
  framebook: Framebook;
  warnings: FramebookWarning[];
} {
  const warnings: FramebookWarning[] = [];

  for (const section of REQUIRED_SECTIONS) {
    if (Object.keys(framebook[section]).length === 0) {
      warnings.push({
        code: "framebook_section_missing",
        message: `Section '${section}' is missing or empty`,
      });
    }
  }

  const known = new Set(Object.keys(framebook.frames));
  const unknown = (source: string, frame: string) =>
    warnings.push({
      code: "framebook_unknown_frame",
      message: `${source} references unknown frame '${frame}'`,
    });

  for (const tension of framebook.frame_tensions) {
    if (!known.has(tension.frame_a)) unknown("frame_tensions", tension.frame_a);
    if (!known.has(tension.frame_b)) unknown("frame_tensions", tension.frame_b);
  }

  for (const frame of Object.keys(framebook.frame_priorities)) {
    if (!known.has(frame)) unknown("frame_priorities", frame);
  }

  const conflicts = framebook.frame_conflicts.filter((rule) => {
    if (!known.has(rule.trigger_frame)) unknown("frame_conflicts", rule.trigger_frame);
    if (!known.has(rule.target_frame)) unknown("frame_conflicts", rule.target_frame);

    const factor = rule.downweight_factor;
    if (Number.isFinite(factor) && factor >= 0 && factor <= 1) return true;
    warnings.push({
      code: "framebook_invalid_factor",
      message: `Conflict ${rule.trigger_frame} -> ${rule.target_frame} dropped: downweight_factor ${factor} outside [0, 1]`,
    });
    return false;
  });

  if (framebook.frame_roles) {
    const roles = framebook.frame_roles;
    const named = [
      ...roles.claim,
      ...roles.structure,
      ...roles.context.amplifying,
      ...roles.context.dampening,
      ...roles.context.neutral,
    ];
    for (const frame of named) {
      if (!known.has(frame)) unknown("frame_roles", frame);
    }
  }

  return { framebook: { ...framebook, frame_conflicts: conflicts }, warnings };
}
