import { describe, expect, it } from 'vitest';
import { slugify } from './slug';

describe('slugify', () => {
  it('folds accents and joins words with dashes', () => {
    expect(slugify('Général Info')).toBe('general-info');
    expect(slugify('  Côté -- Jardin  ')).toBe('cote-jardin');
  });

  it('drops punctuation', () => {
    expect(slugify("Owner's data (2024)!")).toBe('owners-data-2024');
    expect(slugify('!!!')).toBe('');
  });
});
