import { describe, expect, it } from 'vitest';
import { getLanguageName, isSupportedLanguage, listLanguagesByName, resolveLanguageCode } from './languages.js';

describe('languages', () => {
  it('resolves codes case-insensitively to their canonical spelling', () => {
    expect(resolveLanguageCode('zh-cn')).toBe('zh-CN');
    expect(resolveLanguageCode(' ES ')).toBe('es');
    expect(resolveLanguageCode('xx')).toBeUndefined();
    expect(resolveLanguageCode(undefined)).toBeUndefined();
  });

  it('names supported languages', () => {
    expect(getLanguageName('ja')).toBe('Japanese');
    expect(getLanguageName('xx')).toBe('Unknown');
    expect(isSupportedLanguage('ca')).toBe(true);
  });

  it('lists languages sorted by name', () => {
    const names = listLanguagesByName().map((language) => language.name);
    expect(names).toHaveLength(18);
    expect(names.slice(0, 3)).toEqual(['Arabic', 'Catalan', 'Chinese (Simplified)']);
    expect(names[names.length - 1]).toBe('Vietnamese');
  });
});
