import { describe, expect, it } from 'vitest';
import { createTranslator } from './index.js';

describe('translator-mock', () => {
  it('pseudo-localizes translated strings', async () => {
    const translator = createTranslator({ provider: 'mock' });
    const translated = await translator.translate('Hello, world', 'en', 'es');
    expect(translated).toBe('[es] Hélló, wórld');
  });

  it('leaves placeholder markers untouched', async () => {
    const translator = createTranslator({ provider: 'mock' });
    await expect(translator.translate('Hi __PH_0__', 'en', 'fr')).resolves.toBe('[fr] Hí __PH_0__');
  });

  it('can skip accenting through factory config', async () => {
    const translator = createTranslator({ provider: 'mock', config: { accentVowels: false } });
    await expect(translator.translate('Save', 'en', 'de')).resolves.toBe('[de] Save');
  });

  it('reports the configured language for non-blank samples', async () => {
    const translator = createTranslator({ provider: 'mock', detectedLanguage: 'fr' });
    await expect(translator.detectLanguage(['Bonjour'])).resolves.toBe('fr');
    await expect(translator.detectLanguage(['  '])).resolves.toBeUndefined();
  });
});
