import { classify } from '../classification/category-classifier.js';
import { SUPER_CATEGORY_RULES, type SuperCategory } from '../classification/super-categories.js';
import type { CategorizedPois } from '../pois/poi.types.js';

export interface ChartEntry {
  label: string;
  count: number;
  color: string;
}

export function countBySuperCategory(pois: CategorizedPois): Map<SuperCategory, number> {
  const counts = new Map<SuperCategory, number>();
  for (const [category, list] of pois) {
    if (list.length === 0) continue;
    const key = classify(category);
    counts.set(key, (counts.get(key) ?? 0) + list.length);
  }
  return counts;
}

/**
 * Chart entries in super-category declaration order; empty groups omitted.
 */
export function aggregate(pois: CategorizedPois): ChartEntry[] {
  const counts = countBySuperCategory(pois);
  const entries: ChartEntry[] = [];
  for (const rule of SUPER_CATEGORY_RULES) {
    const count = counts.get(rule.key) ?? 0;
    if (count > 0) entries.push({ label: rule.displayName, count, color: rule.color });
  }
  return entries;
}
