/**
 * Page categorizer - classifies a page into one of the fixed categories
 * from URL path patterns and keyword hits in its title and text.
 *
 * URL patterns weigh 0.7 and keywords 0.3; each side is the fraction of the
 * category's rules that matched.
 */

import fs from "fs/promises";
import { fileURLToPath } from "url";
import { z } from "zod";
import { PAGE_CATEGORIES, type PageCategory } from "./types.js";

export interface CategoryMatch {
  category: PageCategory;
  confidence: number;
  matchedPatterns: string[];
  matchedKeywords: string[];
}

export interface CategoryRules {
  urlPatterns: Record<PageCategory, string[]>;
  keywords: Record<PageCategory, string[]>;
}

const ruleLists = z.object({
  content: z.array(z.string()),
  hubs: z.array(z.string()),
  recruitment: z.array(z.string()),
  interactable: z.array(z.string()),
});

const categoryRulesSchema = z.object({
  urlPatterns: ruleLists,
  keywords: ruleLists,
});

// data/ sits at the project root, two levels up from both src/crawler and dist/crawler
export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL("../../data/category-rules.json", import.meta.url)
);

/**
 * Reads and validates a category rules file
 */
export async function loadCategoryRules(path = DEFAULT_RULES_PATH): Promise<CategoryRules> {
  const content = await fs.readFile(path, "utf-8");
  const parsed = categoryRulesSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid category rules in ${path}: ${problems}`);
  }
  return parsed.data;
}

const URL_WEIGHT = 0.7;
const KEYWORD_WEIGHT = 0.3;
const FALLBACK: CategoryMatch = {
  category: "content",
  confidence: 0.1,
  matchedPatterns: [],
  matchedKeywords: [],
};

export const CATEGORY_DESCRIPTIONS: Record<PageCategory, string> = {
  content: "Informational pages (blogs, videos, product info)",
  hubs: "Navigation and aggregation pages (home, archives, category pages)",
  recruitment: "Career and job-related pages",
  interactable: "User input pages (forms, tools, payments)",
};

export class PageCategorizer {
  private readonly patterns: Record<PageCategory, Array<{ source: string; regex: RegExp }>>;
  private readonly keywords: Record<PageCategory, string[]>;

  /** Builds a categorizer from the rules file at `path` */
  static async load(path?: string): Promise<PageCategorizer> {
    return new PageCategorizer(await loadCategoryRules(path));
  }

  constructor(categoryRules: CategoryRules) {
    this.patterns = {
      content: compile(categoryRules.urlPatterns.content),
      hubs: compile(categoryRules.urlPatterns.hubs),
      recruitment: compile(categoryRules.urlPatterns.recruitment),
      interactable: compile(categoryRules.urlPatterns.interactable),
    };
    this.keywords = categoryRules.keywords;
  }

  categorize(url: string, title = "", text = ""): CategoryMatch {
    let path: string;
    try {
      path = new URL(url).pathname.toLowerCase();
    } catch {
      path = "";
    }
    const haystack = `${title} ${text}`.toLowerCase();

    let best: CategoryMatch | null = null;
    let bestScore = 0;

    for (const category of PAGE_CATEGORIES) {
      const patterns = this.patterns[category];
      const keywords = this.keywords[category];

      const matchedPatterns = patterns
        .filter((p) => p.regex.test(path))
        .map((p) => p.source);
      const matchedKeywords = keywords.filter((k) => haystack.includes(k.toLowerCase()));

      const urlScore = patterns.length ? matchedPatterns.length / patterns.length : 0;
      const keywordScore = keywords.length ? matchedKeywords.length / keywords.length : 0;
      const score = urlScore * URL_WEIGHT + keywordScore * KEYWORD_WEIGHT;

      if (score > bestScore) {
        bestScore = score;
        best = {
          category,
          confidence: Math.round(Math.min(score, 1) * 100) / 100,
          matchedPatterns,
          matchedKeywords,
        };
      }
    }

    return best ?? { ...FALLBACK };
  }
}

function compile(patterns: string[]): Array<{ source: string; regex: RegExp }> {
  return patterns.map((source) => ({ source, regex: new RegExp(source, "i") }));
}
