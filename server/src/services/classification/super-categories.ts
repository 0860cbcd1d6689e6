/**
 * Super-category rule table
 *
 * Declaration order is the classification precedence and the chart order.
 * `other` has no patterns and is the unconditional default.
 */

export const SUPER_CATEGORY_KEYS = [
  'healthcare',
  'education',
  'shopping',
  'food_drink',
  'transport',
  'financial',
  'leisure',
  'office',
  'community',
  'other'
] as const;

export type SuperCategory = (typeof SUPER_CATEGORY_KEYS)[number];

export interface SuperCategoryRule {
  readonly key: SuperCategory;
  readonly displayName: string;
  readonly color: string;
  readonly patterns: readonly string[];
}

function rule(key: SuperCategory, displayName: string, color: string, patterns: string[]): SuperCategoryRule {
  return Object.freeze({ key, displayName, color, patterns: Object.freeze([...patterns]) });
}

export const SUPER_CATEGORY_RULES: readonly SuperCategoryRule[] = Object.freeze([
  rule('healthcare', 'Healthcare', '#0088FE', [
    'hospital', 'healthcare', 'doctors', 'pharmacy', 'blood_bank', 'optometrist', 'alternative'
  ]),
  rule('education', 'Education', '#00C49F', [
    'school', 'college', 'university', 'kindergarten', 'training', 'language_school', 'education'
  ]),
  rule('shopping', 'Shopping', '#FFBB28', ['shop', 'supermarket', 'mall', 'market', 'bakery', 'convenience']),
  rule('food_drink', 'Food & Drink', '#FF8042', [
    'restaurant', 'cafe', 'pub', 'bar', 'fast_food', 'food_court', 'ice_cream'
  ]),
  rule('transport', 'Transport', '#AF19FF', ['bus', 'train', 'station', 'taxi', 'parking', 'transport']),
  rule('financial', 'Financial', '#FF1919', ['bank', 'atm', 'money', 'financial', 'insurance']),
  rule('leisure', 'Leisure', '#17BECF', [
    'leisure', 'park', 'garden', 'playground', 'swimming', 'sports', 'pitch', 'track'
  ]),
  rule('office', 'Office', '#9467BD', [
    'office', 'administrative', 'government', 'estate_agent', 'tax', 'telecommunication'
  ]),
  rule('community', 'Community', '#D62728', [
    'community', 'social', 'public', 'toilets', 'drinking_water', 'bench', 'library'
  ]),
  rule('other', 'Other', '#7F7F7F', [])
]);

const RULES_BY_KEY: ReadonlyMap<SuperCategory, SuperCategoryRule> = new Map(
  SUPER_CATEGORY_RULES.map(r => [r.key, r])
);

export function getSuperCategoryRule(key: SuperCategory): SuperCategoryRule {
  const found = RULES_BY_KEY.get(key);
  if (!found) throw new Error(`Unknown super-category: ${key}`);
  return found;
}
