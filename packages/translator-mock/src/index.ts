import type { Translator, TranslatorFactoryOptions } from '@transjson/translation';

const ACCENT_MAP: Record<string, string> = {
  a: 'á',
  e: 'é',
  i: 'í',
  o: 'ó',
  u: 'ú',
  A: 'Á',
  E: 'É',
  I: 'Í',
  O: 'Ó',
  U: 'Ú',
};

export interface MockTranslatorOptions extends TranslatorFactoryOptions {
  accentVowels?: boolean;
  /** Language reported by detectLanguage(); defaults to "en". */
  detectedLanguage?: string;
}

export function createTranslator(options: MockTranslatorOptions): Translator {
  const accentVowels = options.accentVowels ?? readBoolean(options.config?.accentVowels) ?? true;
  const detectedLanguage = options.detectedLanguage ?? readString(options.config?.detectedLanguage) ?? 'en';

  return {
    name: 'mock',
    async translate(text: string, _sourceLanguage: string, targetLanguage: string): Promise<string> {
      return pseudoLocalize(text, targetLanguage, accentVowels);
    },
    async detectLanguage(samples: string[]): Promise<string | undefined> {
      return samples.some((sample) => sample.trim().length > 0) ? detectedLanguage : undefined;
    },
  };
}

export function pseudoLocalize(input: string, locale: string, accentVowels: boolean): string {
  const prefix = `[${locale}]`;
  if (!input) {
    return `${prefix}`;
  }

  if (!accentVowels) {
    return `${prefix} ${input}`;
  }

  const transformed = Array.from(input)
    .map((char) => ACCENT_MAP[char] ?? char)
    .join('');
  return `${prefix} ${transformed}`;
}

function readBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length ? value.trim() : undefined;
}

export default {
  createTranslator,
};
