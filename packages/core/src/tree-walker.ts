export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LeafPathSegment = string | number;
export type LeafPath = readonly LeafPathSegment[];

export interface LeafRef {
  path: LeafPath;
  /** Stable string form of `path`, unique within one document. */
  key: string;
  /** Position of the leaf in extraction order. */
  index: number;
  text: string;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) {
        return true;
      }
      if (Array.isArray(value)) {
        return value.every((item) => isJsonValue(item));
      }
      return isJsonObject(value) && Object.values(value).every((item) => isJsonValue(item));
    default:
      return false;
  }
}

export function isTranslatableText(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function toLeafKey(path: LeafPath): string {
  return JSON.stringify(path);
}

/**
 * Human-readable path such as `home.items[2].title`.
 */
export function formatLeafPath(path: LeafPath): string {
  if (!path.length) {
    return '(root)';
  }
  return path
    .map((segment, index) => {
      if (typeof segment === 'number') {
        return `[${segment}]`;
      }
      return index === 0 ? segment : `.${segment}`;
    })
    .join('');
}

function visitLeaves(node: JsonValue, path: LeafPathSegment[], visit: (text: string, path: LeafPath) => boolean | void): boolean {
  if (Array.isArray(node)) {
    for (let index = 0; index < node.length; index += 1) {
      if (visitLeaves(node[index], [...path, index], visit) === false) {
        return false;
      }
    }
    return true;
  }

  if (isJsonObject(node)) {
    for (const [key, value] of Object.entries(node)) {
      if (visitLeaves(value, [...path, key], visit) === false) {
        return false;
      }
    }
    return true;
  }

  if (isTranslatableText(node)) {
    return visit(node, path) !== false;
  }
  return true;
}

/**
 * Collect every translatable string in document order.
 */
export function extractLeaves(document: JsonValue): LeafRef[] {
  const leaves: LeafRef[] = [];
  visitLeaves(document, [], (text, path) => {
    leaves.push({ path, key: toLeafKey(path), index: leaves.length, text });
  });
  return leaves;
}

/**
 * First `max` translatable strings, used as language detection samples.
 */
export function collectSamples(document: JsonValue, max = 20): string[] {
  const samples: string[] = [];
  if (max <= 0) {
    return samples;
  }
  visitLeaves(document, [], (text) => {
    samples.push(text);
    return samples.length < max;
  });
  return samples;
}

export function getValueAtPath(document: JsonValue, path: LeafPath): JsonValue | undefined {
  let current: JsonValue | undefined = document;
  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current) || segment >= current.length) {
        return undefined;
      }
      current = current[segment];
      continue;
    }
    if (!isJsonObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Rebuild `document` with the leaves listed in `replacements` (keyed by
 * {@link toLeafKey}) replaced. The input is left untouched.
 */
export function reassembleDocument(document: JsonValue, replacements: ReadonlyMap<string, JsonValue>): JsonValue {
  const rebuild = (node: JsonValue, path: LeafPathSegment[]): JsonValue => {
    if (Array.isArray(node)) {
      return node.map((item, index) => rebuild(item, [...path, index]));
    }

    if (isJsonObject(node)) {
      return Object.fromEntries(Object.entries(node).map(([key, value]) => [key, rebuild(value, [...path, key])]));
    }

    if (typeof node === 'string') {
      const replacement = replacements.get(toLeafKey(path));
      return replacement === undefined ? node : replacement;
    }
    return node;
  };

  return rebuild(document, []);
}
