/**
 * Configured chart-of-accounts hierarchy and source → destination category names
 */

import { CategoryMappingConfig } from '../config';

export const FALLBACK_CATEGORY = 'Other Expenses';

export class CategoryMapping {
  private readonly lowerMappings: Map<string, string>;
  private readonly parentOf = new Map<string, string>();
  private readonly known = new Set<string>();

  constructor(private readonly config: CategoryMappingConfig) {
    this.lowerMappings = new Map(
      Object.entries(config.mappings).map(([source, destination]) => [source.trim().toLowerCase(), destination])
    );
    for (const [parent, children] of Object.entries(config.hierarchy)) {
      this.known.add(parent);
      for (const child of children) {
        this.known.add(child);
        if (!this.parentOf.has(child)) {
          this.parentOf.set(child, parent);
        }
      }
    }
  }

  get parentCategories(): string[] {
    return Object.keys(this.config.hierarchy);
  }

  children(parent: string): string[] {
    return this.config.hierarchy[parent] ?? [];
  }

  /** Parents and children, each once */
  get allCategoryNames(): string[] {
    return [...this.known];
  }

  /** undefined for parents and names outside the hierarchy */
  parentName(category: string): string | undefined {
    if (this.isParentCategory(category)) {
      return undefined;
    }
    return this.parentOf.get(category);
  }

  isParentCategory(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.config.hierarchy, name);
  }

  categoryExists(name: string): boolean {
    return this.known.has(name);
  }

  /** Explicit mapping when configured, otherwise the same name */
  destinationFor(sourceName: string): string {
    return this.lowerMappings.get(sourceName.trim().toLowerCase()) ?? sourceName;
  }

  /**
   * Category for unmapped source categories: the configured default, else the
   * first name containing "other", else the first parent
   */
  get defaultCategory(): string {
    if (this.config.defaultCategory) {
      return this.config.defaultCategory;
    }
    const other = this.allCategoryNames.find(name => name.toLowerCase().includes('other'));
    return other ?? this.parentCategories[0] ?? FALLBACK_CATEGORY;
  }
}
