import { Diagnostics } from "../diagnostics/diagnostics.js";
import { CATEGORY_SECTIONS, CategorySectionName, Framebook } from "./framebook.schema.js";

export type PronounRule = {
  label: string;
  patterns: string[];
};

/**
 * Language-scoped read access to the framebook. Missing language coverage
 * is reported once per (section, category, language) and yields no patterns.
 */
export class PatternCatalog {
  constructor(
    readonly framebook: Framebook,
    private readonly diagnostics: Diagnostics
  ) {}

  /** Category names of a section, in configuration order. */
  categories(section: CategorySectionName): string[] {
    return Object.keys(this.framebook[section]);
  }

  patternsFor(section: CategorySectionName, category: string, language: string): string[] {
    const config = this.framebook[section][category];
    const patterns = config?.patterns[language];
    if (patterns && patterns.length > 0) return patterns;

    this.diagnostics.once(`patterns:${section}:${category}:${language}`, {
      code: "patterns_missing_for_language",
      message: `No '${language}' patterns for ${section}.${category}; category skipped`,
      context: { section, category, language },
    });
    return [];
  }

  pronounsFor(language: string): PronounRule[] {
    const table = this.framebook.pronouns[language];
    if (!table || Object.keys(table).length === 0) {
      this.diagnostics.once(`pronouns:${language}`, {
        code: "pronouns_missing_for_language",
        message: `No '${language}' pronoun table; pronoun positioning skipped`,
        context: { language },
      });
      return [];
    }
    return Object.entries(table).map(([label, value]) => ({
      label,
      patterns: Array.isArray(value) ? value : [value],
    }));
  }

  priorityOf(frame: string, fallback: number): number {
    return this.framebook.frame_priorities[frame] ?? fallback;
  }

  languages(): string[] {
    const languages = new Set<string>(Object.keys(this.framebook.pronouns));
    for (const section of CATEGORY_SECTIONS) {
      for (const config of Object.values(this.framebook[section])) {
        Object.keys(config.patterns).forEach((lang) => languages.add(lang));
      }
    }
    return [...languages].sort((a, b) => a.localeCompare(b));
  }
}
