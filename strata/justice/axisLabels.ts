/**
 * Readable names for claim × structure tension axes. Pairs not listed fall back
 * to "<claim> × <structure>".
 */
const AXIS_LABELS: Record<string, Record<string, string>> = {
  LEGITIMACY_JUSTICE: {
    ECONOMIZATION: "Fairness vs. market logic",
    EXCLUSION_OTHERING: "Rights vs. exclusion",
    BUREAUCRATIC_ORDER: "Dignity vs. procedure",
    INSTITUTIONAL_LOGIC: "Justice vs. system logic",
  },
  AUTONOMY_SELF_DETERMINATION: {
    ECONOMIZATION: "Self-determination vs. cost pressure",
    BUREAUCRATIC_ORDER: "Agency vs. bureaucracy",
    EXCLUSION_OTHERING: "Participation vs. exclusion",
    INSTITUTIONAL_LOGIC: "Autonomy vs. systemic constraint",
  },
  SOLIDARITY_COMMUNITY: {
    ECONOMIZATION: "Community vs. market logic",
    EXCLUSION_OTHERING: "Cohesion vs. division",
    BUREAUCRATIC_ORDER: "Solidarity vs. procedural logic",
    INSTITUTIONAL_LOGIC: "Community vs. system",
  },
};

export function axisLabel(claimFrame: string, structureFrame: string): string {
  return AXIS_LABELS[claimFrame]?.[structureFrame] ?? `${claimFrame} × ${structureFrame}`;
}
