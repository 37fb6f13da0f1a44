const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  pt: 'Portuguese (Brazil)',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  nl: 'Dutch',
  pl: 'Polish',
  ru: 'Russian',
  uk: 'Ukrainian',
  tr: 'Turkish',
  ar: 'Arabic',
  hi: 'Hindi',
  id: 'Indonesian',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
};

function lookup(code: string): string | undefined {
  return Object.hasOwn(LANGUAGE_NAMES, code) ? LANGUAGE_NAMES[code] : undefined;
}

export function languageName(code: string): string {
  return lookup(code.toLowerCase()) ?? code;
}

/**
 * True when a provider-reported language ("english", "en", "Portuguese")
 * names the same language as a target code. Unknown reports never match.
 */
export function isSameLanguage(reported: string | undefined, targetCode: string): boolean {
  if (!reported) return false;
  const a = reported.trim().toLowerCase();
  const code = targetCode.trim().toLowerCase();
  if (a === code) return true;
  const name = lookup(code);
  if (!name) return false;
  const base = name.toLowerCase().split(' ')[0];
  return a === name.toLowerCase() || a === base;
}
