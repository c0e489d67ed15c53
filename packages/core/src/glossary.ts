import { protectPlaceholders, restorePlaceholders, type PlaceholderGrammar } from './placeholders.js';

export interface GlossaryRule {
  source: string;
  target: string;
}

const WORD_CHAR = '[\\p{L}\\p{N}_]';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileRule(rule: GlossaryRule): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(rule.source)}(?!${WORD_CHAR})`, 'giu');
}

/**
 * Apply glossary rules in declaration order. Each rule replaces whole-word,
 * case-insensitive matches; later rules see the output of earlier ones.
 * Placeholder tokens are masked while rules run.
 */
export function applyGlossary(
  text: string,
  rules: readonly GlossaryRule[],
  grammars?: readonly PlaceholderGrammar[]
): string {
  if (!text || !rules.length) {
    return text;
  }

  const masked = protectPlaceholders(text, grammars);
  let result = masked.text;
  for (const rule of rules) {
    if (!rule.source) {
      continue;
    }
    result = result.replace(compileRule(rule), () => rule.target);
  }

  return masked.tokens.length ? restorePlaceholders(result, masked.tokens).text : result;
}

/**
 * Accept `{ "car": "auto" }`, `[{ source, target }]` or `[["car", "auto"]]`
 * and return the rules in their declared order.
 */
export function normalizeGlossaryRules(input: unknown): GlossaryRule[] {
  const rules: GlossaryRule[] = [];
  const push = (source: unknown, target: unknown) => {
    if (typeof source !== 'string' || typeof target !== 'string') {
      return;
    }
    const trimmed = source.trim();
    if (!trimmed.length) {
      return;
    }
    rules.push({ source: trimmed, target });
  };

  if (Array.isArray(input)) {
    for (const entry of input) {
      if (Array.isArray(entry)) {
        push(entry[0], entry[1]);
      } else if (entry && typeof entry === 'object' && 'source' in entry && 'target' in entry) {
        push(entry.source, entry.target);
      }
    }
    return rules;
  }

  if (input && typeof input === 'object') {
    for (const [source, target] of Object.entries(input)) {
      push(source, target);
    }
  }

  return rules;
}
