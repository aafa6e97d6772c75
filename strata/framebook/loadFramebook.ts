import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { strataLog } from "../../logging/strataLog.js";
import {
  FramebookNotFoundError,
  FramebookParseError,
  FramebookSchemaError,
} from "../errors.js";
import {
  CategorySection,
  Framebook,
  FramebookOverlay,
  FramebookOverlaySchema,
  FramebookSchema,
} from "./framebook.schema.js";
import { FramebookWarning, validateFramebook } from "./validateFramebook.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_FRAMEBOOK_PATH = path.resolve(__dirname, "data/framebook.v1.json");

export type FramebookLoadResult = {
  framebook: Framebook;
  warnings: FramebookWarning[];
  source: string;
  overlay_name: string | null;
};

export type LoadFramebookOptions = {
  path?: string;
  overlayPath?: string;
};

function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new FramebookNotFoundError(filePath);
  }
  const raw = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new FramebookParseError(filePath, err instanceof Error ? err.message : String(err));
  }
}

function mergePatterns(target: CategorySection, extension: CategorySection): CategorySection {
  const merged: CategorySection = { ...target };
  for (const [name, ext] of Object.entries(extension)) {
    const base = merged[name];
    if (!base) continue;
    const patterns: Record<string, string[]> = { ...base.patterns };
    for (const [lang, list] of Object.entries(ext.patterns)) {
      const existing = patterns[lang] ?? [];
      patterns[lang] = [...existing, ...list.filter((p) => !existing.includes(p))];
    }
    merged[name] = { ...base, patterns };
  }
  return merged;
}

/**
 * Overlay on top of a base framebook. Extensions to unknown categories are ignored;
 * new categories, tensions and conflicts are appended; priorities are overridden.
 */
export function applyOverlay(base: Framebook, overlay: FramebookOverlay): Framebook {
  return {
    ...base,
    frames: { ...mergePatterns(base.frames, overlay.frames), ...overlay.overlay_frames },
    topoi: { ...mergePatterns(base.topoi, overlay.topoi), ...overlay.overlay_topoi },
    frame_tensions: [...base.frame_tensions, ...overlay.frame_tensions],
    frame_priorities: { ...base.frame_priorities, ...overlay.frame_priorities },
    frame_conflicts: [...base.frame_conflicts, ...overlay.frame_conflicts],
  };
}

/**
 * Validates an in-memory framebook (and optional overlay) without touching the filesystem.
 */
export function buildFramebook(
  raw: unknown,
  options: { source?: string; overlay?: unknown; overlaySource?: string } = {}
): FramebookLoadResult {
  const source = options.source ?? "<inline>";
  const parsed = FramebookSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FramebookSchemaError(source, parsed.error.message);
  }

  let framebook = parsed.data;
  let overlay_name: string | null = null;
  if (options.overlay !== undefined) {
    const overlay = FramebookOverlaySchema.safeParse(options.overlay);
    if (!overlay.success) {
      throw new FramebookSchemaError(
        options.overlaySource ?? `${source} (overlay)`,
        overlay.error.message
      );
    }
    overlay_name = overlay.data.overlay.name ?? options.overlaySource ?? "overlay";
    framebook = applyOverlay(framebook, overlay.data);
  }

  const validated = validateFramebook(framebook);
  return { framebook: validated.framebook, warnings: validated.warnings, source, overlay_name };
}

/**
 * Reads the framebook from disk. Path precedence: option, STRATA_FRAMEBOOK_PATH,
 * bundled default. Missing, unreadable or malformed files are fatal; semantic
 * problems come back as warnings.
 */
export function loadFramebook(options: LoadFramebookOptions = {}): FramebookLoadResult {
  const filePath = path.resolve(
    options.path ?? process.env.STRATA_FRAMEBOOK_PATH ?? DEFAULT_FRAMEBOOK_PATH
  );
  const overlayPath = options.overlayPath ?? process.env.STRATA_FRAMEBOOK_OVERLAY;

  const raw = readJson(filePath);
  const overlaySource = overlayPath ? path.resolve(overlayPath) : undefined;
  const overlay = overlaySource ? readJson(overlaySource) : undefined;

  const result = buildFramebook(raw, { source: filePath, overlay, overlaySource });

  for (const warning of result.warnings) {
    strataLog({ event: "framebook.warning", code: warning.code, message: warning.message }, "warn");
  }
  strataLog({
    event: "framebook.loaded",
    source: filePath,
    version: result.framebook.version,
    overlay: result.overlay_name,
    frame_count: Object.keys(result.framebook.frames).length,
    warning_count: result.warnings.length,
  });

  return result;
}
