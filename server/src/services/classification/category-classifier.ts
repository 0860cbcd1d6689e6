import { SUPER_CATEGORY_RULES, type SuperCategory } from './super-categories.js';

/**
 * Map a raw category to its super-category.
 * Case-insensitive substring match; first rule in declaration order wins.
 */
export function classify(rawCategory: string): SuperCategory {
  const needle = rawCategory.toLowerCase();
  for (const rule of SUPER_CATEGORY_RULES) {
    if (rule.patterns.some(pattern => needle.includes(pattern))) {
      return rule.key;
    }
  }
  return 'other';
}
