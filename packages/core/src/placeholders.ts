export type PlaceholderGrammar =
  | 'doubleBrace'
  | 'dollarBrace'
  | 'percentNamed'
  | 'doubleBracket'
  | 'positionalBrace'
  | 'singleBraceName'
  | 'percent';

/** Token kinds: the grammars plus marker-shaped text already present in the source. */
export type PlaceholderTokenKind = PlaceholderGrammar | 'literalMarker';

interface PlaceholderGrammarDescriptor {
  grammar: PlaceholderTokenKind;
  source: RegExp;
}

const MARKER_PATTERN = /__PH_\d+__/g;

/**
 * Always scanned first, so a literal marker in the input becomes a token and
 * restores as itself.
 */
const LITERAL_MARKER: PlaceholderGrammarDescriptor = { grammar: 'literalMarker', source: MARKER_PATTERN };

/**
 * Grammars in priority order. At a given position the first grammar that
 * matches wins, so `{{name}}` is never split into `{` + `{name}` + `}`.
 */
const PLACEHOLDER_GRAMMARS: ReadonlyArray<PlaceholderGrammarDescriptor & { grammar: PlaceholderGrammar }> = [
  { grammar: 'doubleBrace', source: /\{\{[^}]+\}\}/ },
  { grammar: 'dollarBrace', source: /\$\{[^}]+\}/ },
  { grammar: 'percentNamed', source: /%\([^)]+\)[sd]/ },
  { grammar: 'doubleBracket', source: /\[\[[\w\s]+\]\]/ },
  { grammar: 'positionalBrace', source: /\{[0-9]+\}/ },
  { grammar: 'singleBraceName', source: /\{[a-zA-Z_][a-zA-Z0-9_]*\}/ },
  { grammar: 'percent', source: /%[sd]/ },
];

export const ALL_PLACEHOLDER_GRAMMARS: readonly PlaceholderGrammar[] = PLACEHOLDER_GRAMMARS.map(
  (descriptor) => descriptor.grammar
);

export interface PlaceholderToken {
  grammar: PlaceholderTokenKind;
  value: string;
  /** Offset of the token in the original text. */
  offset: number;
}

export interface ProtectedText {
  text: string;
  tokens: PlaceholderToken[];
}

export interface PlaceholderMismatch {
  expected: number;
  found: number;
}

export interface RestoredText {
  text: string;
  mismatch?: PlaceholderMismatch;
}

export function createPlaceholderMarker(index: number): string {
  return `__PH_${index}__`;
}

export function isPlaceholderGrammar(value: string): value is PlaceholderGrammar {
  return (ALL_PLACEHOLDER_GRAMMARS as readonly string[]).includes(value);
}

interface PlaceholderScanner {
  regex: RegExp;
  grammars: PlaceholderTokenKind[];
}

const scannerCache = new Map<string, PlaceholderScanner>();

function buildScanner(grammars: readonly PlaceholderGrammar[]): PlaceholderScanner {
  const enabled = [LITERAL_MARKER, ...PLACEHOLDER_GRAMMARS.filter((descriptor) => grammars.includes(descriptor.grammar))];
  const cacheKey = enabled.map((descriptor) => descriptor.grammar).join('|');
  const cached = scannerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const alternation = enabled.map((descriptor) => `(${descriptor.source.source})`).join('|');
  const scanner = {
    regex: new RegExp(alternation, 'g'),
    grammars: enabled.map((descriptor) => descriptor.grammar),
  };
  scannerCache.set(cacheKey, scanner);
  return scanner;
}

/**
 * Replace every interpolation token with an inert positional marker.
 */
export function protectPlaceholders(
  text: string,
  grammars: readonly PlaceholderGrammar[] = ALL_PLACEHOLDER_GRAMMARS
): ProtectedText {
  if (!text) {
    return { text, tokens: [] };
  }

  const scanner = buildScanner(grammars);
  const regex = new RegExp(scanner.regex.source, 'g');
  const tokens: PlaceholderToken[] = [];
  let stripped = '';
  let cursor = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(text)) !== null) {
    const groupIndex = match.findIndex((group, index) => index > 0 && group !== undefined);
    tokens.push({
      grammar: scanner.grammars[groupIndex - 1],
      value: match[0],
      offset: match.index,
    });
    stripped += text.slice(cursor, match.index) + createPlaceholderMarker(tokens.length - 1);
    cursor = match.index + match[0].length;
  }

  if (!tokens.length) {
    return { text, tokens };
  }

  return { text: stripped + text.slice(cursor), tokens };
}

/**
 * Put tokens back in capture order. The i-th marker found in `text` receives
 * the i-th token whatever number the marker carries, so reordered sentences
 * still restore left to right. On a count mismatch tokens are substituted up
 * to the shorter length and the mismatch is reported.
 */
export function restorePlaceholders(text: string, tokens: readonly PlaceholderToken[]): RestoredText {
  let found = 0;
  const restored = text.replace(new RegExp(MARKER_PATTERN.source, 'g'), (marker) => {
    const token = tokens[found];
    found += 1;
    return token ? token.value : marker;
  });

  if (found !== tokens.length) {
    return { text: restored, mismatch: { expected: tokens.length, found } };
  }
  return { text: restored };
}

