import { describe, expect, it, vi } from 'vitest';
import {
  ProviderError,
  TranslatorLoadError,
  buildTranslatorModuleSpecifier,
  isTranslator,
  loadTranslatorFactory,
} from './index.js';

let created = 0;

vi.mock('virtual-translator', () => ({
  createTranslator: () => {
    created += 1;
    const instance = created;
    return {
      name: `virtual-${instance}`,
      translate: async (text: string) => `${text}!`,
      detectLanguage: async () => 'en',
    };
  },
}));

vi.mock('broken-translator', () => ({
  createTranslator: () => ({ name: 'broken' }),
}));

describe('translation package', () => {
  it('builds translator module specifiers from provider names', () => {
    expect(buildTranslatorModuleSpecifier('mock')).toBe('@transjson/translator-mock');
    expect(() => buildTranslatorModuleSpecifier('')).toThrow(TranslatorLoadError);
    expect(buildTranslatorModuleSpecifier('./custom/translator.js')).toBe('./custom/translator.js');
  });

  it('returns a factory that builds a fresh translator per call', async () => {
    const factory = await loadTranslatorFactory({ provider: 'virtual', module: 'virtual-translator' });
    const first = await factory();
    const second = await factory();

    expect(first).not.toBe(second);
    expect(first.name).not.toBe(second.name);
    await expect(first.translate('Hello', 'en', 'es')).resolves.toBe('Hello!');
  });

  it('rejects modules that do not produce a translator', async () => {
    const factory = await loadTranslatorFactory({ provider: 'broken', module: 'broken-translator' });
    await expect(factory()).rejects.toThrow(/did not produce a valid translator/);
  });

  it('recognises translator shapes', () => {
    expect(isTranslator({ name: 'x', translate: async () => '', detectLanguage: async () => undefined })).toBe(true);
    expect(isTranslator({ name: 'x', translate: async () => '' })).toBe(false);
    expect(isTranslator(null)).toBe(false);
  });

  it('flags rate limiting on provider errors', () => {
    const error = new ProviderError('Too many requests', { provider: 'google', status: 429 });
    expect(error.rateLimited).toBe(true);
    expect(error.retryable).toBe(true);
    expect(error.name).toBe('ProviderError');
  });
});
