import { ModuleId } from "../document/annotation.js";
import { Document } from "../document/document.js";
import { textPreview, wordCount } from "../document/turn.js";

/** Markers per 100 words, one decimal. Zero words give 0. */
export function computeDensity(markers: number, words: number): number {
  if (words === 0) return 0;
  return Math.round((markers / words) * 1000) / 10;
}

export type TopSite = {
  turn_id: number;
  annotation_count: number;
  density: number;
  categories: string[];
  text_preview: string;
};

/**
 * Turns with the densest annotation coverage for one module, the places to read first.
 */
export function topSites(document: Document, module: ModuleId, n = 5): TopSite[] {
  const byTurn = new Map<number, string[]>();
  for (const annotation of document.getAnnotations({ module })) {
    const list = byTurn.get(annotation.turn_id) ?? [];
    list.push(annotation.category);
    byTurn.set(annotation.turn_id, list);
  }

  const sites: TopSite[] = [];
  for (const [turn_id, categories] of byTurn) {
    const turn = document.getTurn(turn_id);
    sites.push({
      turn_id,
      annotation_count: categories.length,
      density: computeDensity(categories.length, Math.max(wordCount(turn), 1)),
      categories: [...new Set(categories)].sort((a, b) => a.localeCompare(b)),
      text_preview: textPreview(turn.text, 150),
    });
  }

  return sites.sort((a, b) => b.density - a.density).slice(0, n);
}
