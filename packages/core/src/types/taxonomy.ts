import { FALLBACK_CATEGORY, type CategoryDefinition } from '@inbox-triage/config';

/** A label from the configured taxonomy */
export type Category = string;

export class TaxonomyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaxonomyError';
  }
}

/**
 * The closed, ordered set of categories every component classifies into.
 */
export class Taxonomy {
  private readonly definitions: readonly CategoryDefinition[];
  private readonly byLabel: ReadonlyMap<Category, CategoryDefinition>;

  private constructor(definitions: readonly CategoryDefinition[]) {
    this.definitions = Object.freeze(definitions.map((d) => Object.freeze({ ...d })));
    this.byLabel = new Map(this.definitions.map((d): [Category, CategoryDefinition] => [d.label, d]));
  }

  static create(definitions: readonly CategoryDefinition[]): Taxonomy {
    const seen = new Set<string>();
    for (const { label } of definitions) {
      if (!label.trim()) {
        throw new TaxonomyError('Category labels must not be empty');
      }
      if (seen.has(label)) {
        throw new TaxonomyError(`Duplicate category label '${label}'`);
      }
      seen.add(label);
    }
    if (!seen.has(FALLBACK_CATEGORY)) {
      throw new TaxonomyError(`Taxonomy must include '${FALLBACK_CATEGORY}'`);
    }
    return new Taxonomy(definitions);
  }

  get labels(): readonly Category[] {
    return this.definitions.map((d) => d.label);
  }

  get fallback(): Category {
    return FALLBACK_CATEGORY;
  }

  has(label: string): boolean {
    return this.byLabel.has(label);
  }

  describe(label: Category): string | undefined {
    return this.byLabel.get(label)?.description;
  }

  indexOf(label: Category): number {
    return this.definitions.findIndex((d) => d.label === label);
  }

  entries(): readonly CategoryDefinition[] {
    return this.definitions;
  }
}

export function createTaxonomy(definitions: readonly CategoryDefinition[]): Taxonomy {
  return Taxonomy.create(definitions);
}
