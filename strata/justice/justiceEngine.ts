import { Document } from "../document/document.js";
import { textPreview, Turn } from "../document/turn.js";
import { AGENCY, NONE } from "../framebook/categoryKeys.js";
import { hasRole, ResolvedFrameRoles } from "../framebook/frameRoles.js";
import { AnalyticClaim, byStrength } from "../passes/analyticPass.js";
import { AffectPass } from "../passes/affectPass.js";
import { DiscoursePass } from "../passes/discoursePass.js";
import { PositionPass } from "../passes/positionPass.js";
import { JusticeScoring } from "../policy/scoringPolicy.v1.js";
import { axisLabel } from "./axisLabels.js";
import {
  baseTension,
  classifyTrajectory,
  JusticeTrajectory,
  percentile,
  round,
} from "./justiceMath.js";

export type TensionAxis = {
  claim_frame: string;
  structure_frame: string;
  label: string;
  intensity: number;
  context_tags: string[];
};

export type JusticeTurnProfile = {
  turn_id: number;
  claim_frames: Record<string, number>;
  structure_frames: Record<string, number>;
  claim_total: number;
  structure_total: number;
  base: number;
  affect_mult: number;
  agency_mult: number;
  agency_label: string;
  context_mult: number;
  context_frames: string[];
  intensity: number;
  /** Intensity per 1000 characters of turn text. */
  intensity_norm: number;
  tension_axes: TensionAxis[];
  /** Frames in the turn that carry no role. */
  context_tags: string[];
  is_justice_site: boolean;
  is_strong_site: boolean;
  text_preview: string;
};

export type AxisTotal = {
  claim_frame: string;
  structure_frame: string;
  label: string;
  count: number;
  total_intensity: number;
  turns: number[];
  context_tags: string[];
};

export type DominantTension = {
  claim_frame: string;
  structure_frame: string;
  label: string;
  count: number;
  total_intensity: number;
};

export type JusticeInterviewProfile = {
  justice_score: number;
  justice_density: number;
  site_count: number;
  turn_count: number;
  peak_turns: number[];
  dominant_tension: DominantTension | null;
  trajectory: JusticeTrajectory;
  tension_axes: AxisTotal[];
  strong_threshold: number;
};

export type JusticeClaimType =
  | "JUSTICE_DOMINANCE"
  | "JUSTICE_TRAJECTORY"
  | "JUSTICE_PEAK"
  | "JUSTICE_DENSITY"
  | "JUSTICE_CONTEXT";

export type JusticeClaim = AnalyticClaim & { type: JusticeClaimType };

export type JusticeReport = {
  roles_source: ResolvedFrameRoles["source"];
  interview: JusticeInterviewProfile;
  turns: JusticeTurnProfile[];
  claims: JusticeClaim[];
};

export type JusticePasses = {
  position: PositionPass;
  discourse: DiscoursePass;
  affect: AffectPass;
};

type CacheEntry = {
  revision: number;
  turns: JusticeTurnProfile[];
  interview: JusticeInterviewProfile;
};

type TurnInputs = {
  frames: Record<string, number>;
  dominant_agency: string;
  affect_density: number;
};

const pick = (frames: Record<string, number>, names: ReadonlySet<string>) =>
  Object.fromEntries(Object.entries(frames).filter(([frame]) => names.has(frame)));

const total = (counts: Record<string, number>) =>
  Object.values(counts).reduce((sum, n) => sum + n, 0);

/**
 * (In)justice as a relation between claim frames and structure frames,
 * weighted by affect, agency and context frames.
 *
 * Results are cached per document and rebuilt whenever the document's
 * revision has moved since they were computed.
 */
export class JusticeEngine {
  private readonly cache = new WeakMap<Document, CacheEntry>();

  constructor(
    private readonly passes: JusticePasses,
    private readonly roles: ResolvedFrameRoles,
    private readonly scoring: JusticeScoring
  ) {}

  private agencyMultiplier(agency: string): number {
    if (agency === AGENCY.PASSIVE_SUFFERING) return this.scoring.passive_agency_mult;
    if (agency === AGENCY.MORAL_REFLECTIVE) return this.scoring.moral_agency_mult;
    return 1;
  }

  profileTurn(turn: Turn, inputs: TurnInputs): JusticeTurnProfile {
    const { roles, scoring } = this;
    const claim_frames = pick(inputs.frames, roles.claim);
    const structure_frames = pick(inputs.frames, roles.structure);
    const claim_total = total(claim_frames);
    const structure_total = total(structure_frames);
    const context_tags = Object.keys(inputs.frames)
      .filter((frame) => !hasRole(roles, frame))
      .sort((a, b) => a.localeCompare(b));
    const base = baseTension(claim_total, structure_total);

    const common = {
      turn_id: turn.turn_id,
      claim_frames,
      structure_frames,
      claim_total,
      structure_total,
      agency_label: inputs.dominant_agency,
      context_tags,
      is_strong_site: false,
      text_preview: textPreview(turn.text, 120),
    };

    if (base === 0) {
      return {
        ...common,
        base: 0,
        affect_mult: 1,
        agency_mult: 1,
        context_mult: 1,
        context_frames: [],
        intensity: 0,
        intensity_norm: 0,
        tension_axes: [],
        is_justice_site: false,
      };
    }

    const affect_mult = Math.min(1 + inputs.affect_density / 100, scoring.affect_cap);
    const agency_mult = this.agencyMultiplier(inputs.dominant_agency);

    const context_frames = Object.keys(inputs.frames)
      .filter((frame) => roles.amplifying.has(frame) || roles.dampening.has(frame))
      .sort((a, b) => a.localeCompare(b));
    let context_mult = 1;
    for (const frame of context_frames) {
      context_mult *= roles.amplifying.has(frame) ? scoring.amplifying_mult : scoring.dampening_mult;
    }

    const multiplier = affect_mult * agency_mult * context_mult;
    const intensity = base * multiplier;
    const chars = Math.max(turn.text.length, 1);
    const intensity_norm = intensity / (chars / scoring.norm_chars);

    const tension_axes: TensionAxis[] = [];
    for (const [claim, claimCount] of Object.entries(claim_frames)) {
      for (const [structure, structureCount] of Object.entries(structure_frames)) {
        tension_axes.push({
          claim_frame: claim,
          structure_frame: structure,
          label: axisLabel(claim, structure),
          intensity: round(Math.sqrt(claimCount * structureCount) * multiplier, 2),
          context_tags,
        });
      }
    }
    tension_axes.sort((a, b) => b.intensity - a.intensity);

    return {
      ...common,
      base: round(base, 2),
      affect_mult: round(affect_mult, 3),
      agency_mult,
      context_mult: round(context_mult, 2),
      context_frames,
      intensity: round(intensity, 2),
      intensity_norm: round(intensity_norm, 2),
      tension_axes,
      is_justice_site: true,
    };
  }

  private compute(document: Document): CacheEntry {
    const discourse = new Map(
      this.passes.discourse.summarize(document).map((row) => [row.turn_id, row])
    );
    const position = new Map(
      this.passes.position.summarize(document).map((row) => [row.turn_id, row])
    );
    const affect = new Map(
      this.passes.affect.summarize(document).map((row) => [row.turn_id, row])
    );

    const turns = document.getRespondentTurns().map((turn) =>
      this.profileTurn(turn, {
        frames: discourse.get(turn.turn_id)?.frames ?? {},
        dominant_agency: position.get(turn.turn_id)?.dominant_agency ?? NONE,
        affect_density: affect.get(turn.turn_id)?.marker_density ?? 0,
      })
    );

    const interview = this.aggregate(turns);
    const marked = turns.map((p) => ({
      ...p,
      is_strong_site: p.is_justice_site && p.intensity_norm >= interview.strong_threshold,
    }));
    return { revision: document.revision, turns: marked, interview };
  }

  private aggregate(turns: JusticeTurnProfile[]): JusticeInterviewProfile {
    const sites = turns.filter((p) => p.is_justice_site);
    if (sites.length === 0) {
      return {
        justice_score: 0,
        justice_density: 0,
        site_count: 0,
        turn_count: turns.length,
        peak_turns: [],
        dominant_tension: null,
        trajectory: "insufficient_data",
        tension_axes: [],
        strong_threshold: 0,
      };
    }

    const axes = new Map<string, AxisTotal>();
    for (const site of sites) {
      for (const axis of site.tension_axes) {
        const key = `${axis.claim_frame}|${axis.structure_frame}`;
        const entry = axes.get(key) ?? {
          claim_frame: axis.claim_frame,
          structure_frame: axis.structure_frame,
          label: axis.label,
          count: 0,
          total_intensity: 0,
          turns: [],
          context_tags: [],
        };
        entry.count += 1;
        entry.total_intensity += axis.intensity;
        entry.turns.push(site.turn_id);
        entry.context_tags = [...new Set([...entry.context_tags, ...axis.context_tags])].sort(
          (a, b) => a.localeCompare(b)
        );
        axes.set(key, entry);
      }
    }
    const tension_axes = [...axes.values()].map((axis) => ({
      ...axis,
      total_intensity: round(axis.total_intensity, 2),
    }));

    let dominant: AxisTotal | null = null;
    for (const axis of axes.values()) {
      if (!dominant || axis.total_intensity > dominant.total_intensity) dominant = axis;
    }

    const norms = sites.map((p) => p.intensity_norm);
    const ordered = [...sites].sort((a, b) => a.turn_id - b.turn_id);

    return {
      justice_score: round(norms.reduce((s, v) => s + v, 0), 2),
      justice_density: round(sites.length / turns.length, 2),
      site_count: sites.length,
      turn_count: turns.length,
      peak_turns: [...sites]
        .sort((a, b) => b.intensity_norm - a.intensity_norm)
        .slice(0, this.scoring.peak_count)
        .map((p) => p.turn_id),
      dominant_tension: dominant
        ? {
            claim_frame: dominant.claim_frame,
            structure_frame: dominant.structure_frame,
            label: dominant.label,
            count: dominant.count,
            total_intensity: round(dominant.total_intensity, 2),
          }
        : null,
      trajectory: classifyTrajectory(
        ordered.map((p) => p.intensity_norm),
        { ratio: this.scoring.trajectory_ratio, minSites: this.scoring.trajectory_min_sites }
      ),
      tension_axes: tension_axes.sort((a, b) => b.total_intensity - a.total_intensity),
      strong_threshold: round(percentile(norms, this.scoring.strong_percentile), 2),
    };
  }

  private entry(document: Document): CacheEntry {
    const cached = this.cache.get(document);
    if (cached && cached.revision === document.revision) return cached;
    const fresh = this.compute(document);
    this.cache.set(document, fresh);
    return fresh;
  }

  /** Copies of the cached profiles; the cache backs later claims. */
  turnProfiles(document: Document): JusticeTurnProfile[] {
    return structuredClone(this.entry(document).turns);
  }

  interviewProfile(document: Document): JusticeInterviewProfile {
    return structuredClone(this.entry(document).interview);
  }

  claims(document: Document): JusticeClaim[] {
    const { turns, interview } = this.entry(document);
    const claims: JusticeClaim[] = [];

    const dominant = interview.dominant_tension;
    if (dominant) {
      const axis = interview.tension_axes.find(
        (a) =>
          a.claim_frame === dominant.claim_frame && a.structure_frame === dominant.structure_frame
      );
      const tags = axis && axis.context_tags.length > 0
        ? ` (contextualised by: ${axis.context_tags.join(", ")})`
        : "";
      claims.push({
        type: "JUSTICE_DOMINANCE",
        description: `The central justice tension is ${dominant.label} (${dominant.count} turns, intensity ${dominant.total_intensity})${tags}.`,
        evidence: `Axis ${dominant.claim_frame} × ${dominant.structure_frame} in turns ${(axis?.turns ?? []).join(", ")}`,
        turns: axis?.turns ?? [],
        strength: dominant.total_intensity,
        check_question: `Is ${dominant.structure_frame} experienced mainly as a violation of ${dominant.claim_frame}, or is there another reading of the tension?`,
      });
    }

    if (interview.trajectory === "rising" || interview.trajectory === "falling") {
      claims.push({
        type: "JUSTICE_TRAJECTORY",
        description: `Justice tension is ${interview.trajectory} over the course of the interview.`,
        evidence: `${interview.site_count} justice sites, score ${interview.justice_score}`,
        turns: [],
        strength: interview.justice_score,
        check_question: "Does the change line up with frame shifts or changes in agency?",
      });
    }

    const strong = turns
      .filter((p) => p.is_strong_site)
      .sort((a, b) => b.intensity_norm - a.intensity_norm)
      .slice(0, this.scoring.peak_count);
    for (const site of strong) {
      const top = site.tension_axes[0];
      const axisInfo = top ? `, axis: ${top.label}` : "";
      const tagInfo = site.context_tags.length > 0 ? `, context: ${site.context_tags.join(", ")}` : "";
      claims.push({
        type: "JUSTICE_PEAK",
        description: `Turn ${site.turn_id} is an intense (in)justice site (intensity ${site.intensity_norm} per 1000 chars, ${site.agency_label}${axisInfo}${tagInfo}).`,
        evidence: `base ${site.base} × affect ${site.affect_mult} × agency ${site.agency_mult} × context ${site.context_mult}`,
        turns: [site.turn_id],
        strength: site.intensity_norm,
        check_question: `What exactly is experienced as unjust in turn ${site.turn_id}? Which concrete situation?`,
      });
    }

    if (interview.justice_density >= this.scoring.density_claim_min) {
      claims.push({
        type: "JUSTICE_DENSITY",
        description: `${Math.round(interview.justice_density * 100)}% of turns carry justice tensions; (in)justice runs through the interview.`,
        evidence: `${interview.site_count} of ${interview.turn_count} respondent turns`,
        turns: [],
        strength: interview.justice_density,
        check_question:
          "Is (in)justice the common thread of the interview or an effect of how it was conducted?",
      });
    }

    const allTags = [...new Set(interview.tension_axes.flatMap((a) => a.context_tags))].sort(
      (a, b) => a.localeCompare(b)
    );
    if (allTags.length > 0) {
      claims.push({
        type: "JUSTICE_CONTEXT",
        description: `Justice tensions are modulated by context-specific frames: ${allTags.join(", ")}.`,
        evidence: `Context tags on ${interview.tension_axes.filter((a) => a.context_tags.length > 0).length} axes`,
        turns: [],
        strength: allTags.length,
        check_question: "Do these context frames trigger or amplify the experience of (in)justice?",
      });
    }

    return byStrength(claims);
  }

  report(document: Document): JusticeReport {
    return {
      roles_source: this.roles.source,
      interview: this.interviewProfile(document),
      turns: this.turnProfiles(document),
      claims: this.claims(document),
    };
  }
}
