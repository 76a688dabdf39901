import { describe, it, expect } from 'vitest';
import { encodeLanguageLevel, isLanguageLevel } from '../staging/language-level.js';
import { DEFAULT_SENTINELS } from '../staging/config.js';

describe('encodeLanguageLevel', () => {
  it('labels level codes with the header', () => {
    expect(encodeLanguageLevel('Python', '3', DEFAULT_SENTINELS)).toBe('Python (Level 3)');
    expect(encodeLanguageLevel('C++', '5', new Set())).toBe('C++ (Level 5)');
  });

  it('labels a level code even when the sentinel set contains it', () => {
    expect(encodeLanguageLevel('Rust', '2', new Set(['2']))).toBe('Rust (Level 2)');
  });

  it('passes a free-text answer through unchanged', () => {
    expect(encodeLanguageLevel('Other', 'Klingon', DEFAULT_SENTINELS)).toBe('Klingon');
  });

  it('returns an empty string for sentinel answers', () => {
    expect(encodeLanguageLevel('Python', 'None', DEFAULT_SENTINELS)).toBe('');
    expect(encodeLanguageLevel('Python', '', DEFAULT_SENTINELS)).toBe('');
    expect(encodeLanguageLevel('Python', 'N', new Set(['N', 'None']))).toBe('');
  });

  it('does not treat level 1 as a level code', () => {
    expect(isLanguageLevel('1')).toBe(false);
    expect(encodeLanguageLevel('Python', '1', DEFAULT_SENTINELS)).toBe('1');
  });

  it('trims before recognising a level code', () => {
    expect(isLanguageLevel(' 4 ')).toBe(true);
  });
});
