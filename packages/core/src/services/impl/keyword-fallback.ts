import type { EmailRecord } from '../../types/email.js';
import type { Category, Taxonomy } from '../../types/taxonomy.js';

export interface KeywordMatch {
  category: Category;
  hits: string[];
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Whole-word match; letters and digits on either side break the match
const keywordPattern = (keyword: string): RegExp =>
  new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`, 'iu');

/**
 * Deterministic classification used when the model cannot be. The category
 * with the most distinct keyword hits in subject and body wins; ties go to
 * the earlier taxonomy entry; no hits means the catch-all category.
 */
export class KeywordFallback {
  private readonly table: ReadonlyArray<{ category: Category; patterns: Array<[string, RegExp]> }>;

  constructor(
    private readonly taxonomy: Taxonomy,
    keywords: Readonly<Record<Category, readonly string[]>>
  ) {
    this.table = taxonomy.labels.map((category) => {
      const distinct = [...new Set((keywords[category] ?? []).map((k) => k.trim().toLowerCase()))];
      return {
        category,
        patterns: distinct.filter((k) => k.length > 0).map((k): [string, RegExp] => [k, keywordPattern(k)]),
      };
    });
  }

  match(email: Pick<EmailRecord, 'subject' | 'body'>): KeywordMatch {
    const text = `${email.subject}\n${email.body}`;
    let best: KeywordMatch = { category: this.taxonomy.fallback, hits: [] };

    for (const { category, patterns } of this.table) {
      const hits = patterns.filter(([, pattern]) => pattern.test(text)).map(([keyword]) => keyword);
      if (hits.length > best.hits.length) {
        best = { category, hits };
      }
    }

    return best;
  }
}
