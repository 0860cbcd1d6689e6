import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { classify } from '../src/services/classification/category-classifier.js';
import {
  SUPER_CATEGORY_KEYS,
  SUPER_CATEGORY_RULES,
  getSuperCategoryRule
} from '../src/services/classification/super-categories.js';

describe('classify', () => {
  it('maps a cafe to food_drink', () => {
    assert.equal(classify('cafe'), 'food_drink');
  });

  it('maps shop_bakery to shopping before any food pattern', () => {
    assert.equal(classify('shop_bakery'), 'shopping');
  });

  it('returns the single matching super-category for each unambiguous keyword', () => {
    const cases: Array<[string, string]> = [
      ['pharmacy', 'healthcare'],
      ['kindergarten', 'education'],
      ['supermarket', 'shopping'],
      ['fast_food', 'food_drink'],
      ['taxi', 'transport'],
      ['atm', 'financial'],
      ['leisure_playground', 'leisure'],
      ['office_government', 'office'],
      ['toilets', 'community']
    ];
    for (const [raw, expected] of cases) {
      assert.equal(classify(raw), expected, raw);
    }
  });

  it('prefers the earlier-declared super-category when patterns overlap', () => {
    // both keywords belong to healthcare
    assert.equal(classify('healthcare_pharmacy'), 'healthcare');
    // "school" (education) precedes "bus" (transport)
    assert.equal(classify('bus_school'), 'education');
    // "bank" (financial) precedes "bench" (community) and "park" (leisure)
    assert.equal(classify('bank_park_bench'), 'financial');
    // "station" (transport) precedes "office" (office)
    assert.equal(classify('office_station'), 'transport');
  });

  it('is deterministic across repeated calls', () => {
    const first = classify('restaurant_bar_bank');
    for (let i = 0; i < 5; i++) assert.equal(classify('restaurant_bar_bank'), first);
    assert.equal(first, 'food_drink');
  });

  it('matches case-insensitively', () => {
    assert.equal(classify('Shop_Bakery'), 'shopping');
    assert.equal(classify('HOSPITAL'), 'healthcare');
  });

  it('falls back to other when nothing matches', () => {
    assert.equal(classify('place_of_worship'), 'other');
    assert.equal(classify('building_yes'), 'other');
    assert.equal(classify(''), 'other');
  });

  it('keeps substring semantics for short patterns', () => {
    // "bar" inside "barber" still matches food_drink
    assert.equal(classify('shop_barber'), 'shopping');
    assert.equal(classify('barber'), 'food_drink');
  });
});

describe('super-category table', () => {
  it('declares rules in the fixed order', () => {
    assert.deepEqual(
      SUPER_CATEGORY_RULES.map(r => r.key),
      [...SUPER_CATEGORY_KEYS]
    );
  });

  it('ends with an empty-pattern other rule', () => {
    const other = getSuperCategoryRule('other');
    assert.equal(other.displayName, 'Other');
    assert.equal(other.color, '#7F7F7F');
    assert.deepEqual(other.patterns, []);
  });

  it('is frozen', () => {
    assert.ok(Object.isFrozen(SUPER_CATEGORY_RULES));
    assert.ok(Object.isFrozen(SUPER_CATEGORY_RULES[0]));
    assert.ok(Object.isFrozen(SUPER_CATEGORY_RULES[0].patterns));
  });
});
