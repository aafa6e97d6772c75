/**
 * Category names the scoring layers look for. The framebook may declare
 * more categories; these are the ones with special weight.
 */

export const UNDETERMINED = "UNDETERMINED";

export const PROCESS_STRUCTURE = {
  ACTION_SCHEME: "ACTION_SCHEME",
  TRAJECTORY: "TRAJECTORY",
  TRANSFORMATION: "TRANSFORMATION",
  INSTITUTIONAL_EXPECTATION: "INSTITUTIONAL_EXPECTATION",
} as const;

export const AGENCY = {
  ACTIVE: "ACTIVE",
  PASSIVE_SUFFERING: "PASSIVE_SUFFERING",
  MORAL_REFLECTIVE: "MORAL_REFLECTIVE",
} as const;

export const FRAME = {
  SYSTEM_FAILURE: "SYSTEM_FAILURE",
  VOCATION: "VOCATION",
  ECONOMIZATION: "ECONOMIZATION",
} as const;

export const AFFECT_DIMENSION = {
  AMBIVALENCE: "AMBIVALENCE",
  BODILY_REFERENCE: "BODILY_REFERENCE",
  DISTANCING: "DISTANCING",
} as const;

export const CATEGORY_PREFIX = {
  TYPE: "TYPE_",
  PRONOUN: "PRON_",
  SYNTACTIC: "SYNTACTIC_",
  TOPOS: "TOPOS_",
} as const;

/** Placeholder for "no dominant category" in summary records. */
export const NONE = "-";
