import { Framebook } from "./framebook.schema.js";

export type ResolvedFrameRoles = {
  source: "framebook" | "default";
  claim: ReadonlySet<string>;
  structure: ReadonlySet<string>;
  amplifying: ReadonlySet<string>;
  dampening: ReadonlySet<string>;
  neutral: ReadonlySet<string>;
};

/** Used when the framebook declares no frame_roles. */
export const DEFAULT_FRAME_ROLES = {
  claim: ["LEGITIMACY_JUSTICE", "AUTONOMY_SELF_DETERMINATION", "SOLIDARITY_COMMUNITY"],
  structure: [
    "ECONOMIZATION",
    "BUREAUCRATIC_ORDER",
    "EXCLUSION_OTHERING",
    "INSTITUTIONAL_LOGIC",
  ],
  amplifying: ["VULNERABILITY"],
  dampening: ["NORMALIZATION"],
  neutral: [],
} as const;

export function resolveFrameRoles(framebook: Framebook): ResolvedFrameRoles {
  const roles = framebook.frame_roles;
  if (!roles) {
    return {
      source: "default",
      claim: new Set<string>(DEFAULT_FRAME_ROLES.claim),
      structure: new Set<string>(DEFAULT_FRAME_ROLES.structure),
      amplifying: new Set<string>(DEFAULT_FRAME_ROLES.amplifying),
      dampening: new Set<string>(DEFAULT_FRAME_ROLES.dampening),
      neutral: new Set<string>(DEFAULT_FRAME_ROLES.neutral),
    };
  }
  return {
    source: "framebook",
    claim: new Set(roles.claim),
    structure: new Set(roles.structure),
    amplifying: new Set(roles.context.amplifying),
    dampening: new Set(roles.context.dampening),
    neutral: new Set(roles.context.neutral),
  };
}

/** True when the frame has any role; frames without one become context tags. */
export function hasRole(roles: ResolvedFrameRoles, frame: string): boolean {
  return (
    roles.claim.has(frame) ||
    roles.structure.has(frame) ||
    roles.amplifying.has(frame) ||
    roles.dampening.has(frame) ||
    roles.neutral.has(frame)
  );
}
