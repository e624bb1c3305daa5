import type { Categorizer, Category } from '../types/index.js';

type KeywordRule = { category: Exclude<Category, 'general'>; keywords: string[] };

/** Rules are checked in order; the first category with a matching keyword wins. */
export const DEFAULT_KEYWORD_RULES: KeywordRule[] = [
  { category: 'business', keywords: ['startup', 'business', 'marketing', 'sales'] },
  { category: 'technical', keywords: ['code', 'programming', 'debug', 'api'] },
  { category: 'creative', keywords: ['write', 'story', 'poem', 'fiction'] },
  { category: 'analytical', keywords: ['analyze', 'analyse', 'data', 'metrics'] },
];

/**
 * Substring keyword matcher over the lowercased template. Unmatched templates
 * fall back to 'general'.
 */
export class KeywordCategorizer implements Categorizer {
  private rules: KeywordRule[];

  constructor(rules: KeywordRule[] = DEFAULT_KEYWORD_RULES) {
    this.rules = rules.map((r) => ({ ...r, keywords: r.keywords.map((k) => k.toLowerCase()) }));
  }

  categorize(template: string): Category {
    const text = template.toLowerCase();
    for (const rule of this.rules) {
      if (rule.keywords.some((keyword) => text.includes(keyword))) {
        return rule.category;
      }
    }
    return 'general';
  }
}
