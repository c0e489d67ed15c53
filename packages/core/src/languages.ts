export interface LanguageInfo {
  code: string;
  name: string;
}

export const SUPPORTED_LANGUAGES: readonly LanguageInfo[] = [
  { code: 'en', name: 'English' },
  { code: 'es', name: 'Spanish' },
  { code: 'fr', name: 'French' },
  { code: 'de', name: 'German' },
  { code: 'it', name: 'Italian' },
  { code: 'pt', name: 'Portuguese' },
  { code: 'ja', name: 'Japanese' },
  { code: 'zh-CN', name: 'Chinese (Simplified)' },
  { code: 'ru', name: 'Russian' },
  { code: 'ar', name: 'Arabic' },
  { code: 'hi', name: 'Hindi' },
  { code: 'ko', name: 'Korean' },
  { code: 'nl', name: 'Dutch' },
  { code: 'pl', name: 'Polish' },
  { code: 'sv', name: 'Swedish' },
  { code: 'tr', name: 'Turkish' },
  { code: 'vi', name: 'Vietnamese' },
  { code: 'ca', name: 'Catalan' },
];

const BY_LOWERCASE_CODE = new Map(SUPPORTED_LANGUAGES.map((language) => [language.code.toLowerCase(), language]));

/**
 * Map a language code to its canonical spelling (`zh-cn` → `zh-CN`), or
 * `undefined` when the language is not supported.
 */
export function resolveLanguageCode(code: string | undefined): string | undefined {
  if (!code) {
    return undefined;
  }
  return BY_LOWERCASE_CODE.get(code.trim().toLowerCase())?.code;
}

export function isSupportedLanguage(code: string): boolean {
  return resolveLanguageCode(code) !== undefined;
}

export function getLanguageName(code: string): string {
  const resolved = resolveLanguageCode(code);
  return resolved ? BY_LOWERCASE_CODE.get(resolved.toLowerCase())?.name ?? code : 'Unknown';
}

export function listLanguagesByName(): LanguageInfo[] {
  return [...SUPPORTED_LANGUAGES].sort((a, b) => a.name.localeCompare(b.name));
}
