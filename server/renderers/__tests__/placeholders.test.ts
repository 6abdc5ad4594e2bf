import { describe, it, expect } from 'vitest';
import { listPlaceholders, substitute } from '../placeholders.js';

describe('placeholders', () => {
  it('substitutes known tokens, with or without inner spaces', () => {
    expect(substitute('Dear {{name}} ({{ id }})', { name: 'Ana', id: '1001' })).toBe('Dear Ana (1001)');
  });

  it('leaves unknown tokens exactly as written', () => {
    expect(substitute('{{name}} {{ nickname }}', { name: 'Ana' })).toBe('Ana {{ nickname }}');
  });

  it('supports dotted tokens', () => {
    expect(substitute('{{proposal.number}}', { 'proposal.number': 'P-1' })).toBe('P-1');
  });

  it('ignores inherited object keys', () => {
    expect(substitute('{{constructor}}', {})).toBe('{{constructor}}');
  });

  it('does not treat malformed braces as placeholders', () => {
    expect(substitute('{{1abc}} {name}', { name: 'Ana' })).toBe('{{1abc}} {name}');
  });

  it('lists placeholders in order', () => {
    expect(listPlaceholders('{{a}} x {{ b.c }} {{a}}')).toEqual(['a', 'b.c', 'a']);
  });
});
