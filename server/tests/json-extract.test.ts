import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractJsonBlock } from '../src/llm/json-extract.js';

describe('extractJsonBlock', () => {
  it('parses a bare object', () => {
    assert.deepEqual(extractJsonBlock('{"a":1}'), { ok: true, value: { a: 1 } });
  });

  it('takes the span from the first { to the last }', () => {
    const text = 'Sure! ```json\n{"summary": "nice", "nested": {"x": 2}}\n``` hope that helps';
    assert.deepEqual(extractJsonBlock(text), { ok: true, value: { summary: 'nice', nested: { x: 2 } } });
  });

  it('reports no_json when braces are missing or reversed', () => {
    assert.deepEqual(extractJsonBlock('no json here'), { ok: false, reason: 'no_json' });
    assert.deepEqual(extractJsonBlock('only { opening'), { ok: false, reason: 'no_json' });
    assert.deepEqual(extractJsonBlock('} backwards {'), { ok: false, reason: 'no_json' });
  });

  it('reports invalid_json when the span does not parse', () => {
    assert.deepEqual(extractJsonBlock('{"a": 1} and {"b": 2}'), { ok: false, reason: 'invalid_json' });
    assert.deepEqual(extractJsonBlock("{'single': 'quotes'}"), { ok: false, reason: 'invalid_json' });
  });
});
