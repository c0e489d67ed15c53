import {
  isJsonObject,
  isTranslatableText,
  toLeafKey,
  type JsonValue,
  type LeafPath,
  type LeafPathSegment,
} from './tree-walker.js';

export interface DiffSelectionOptions {
  /** Source document that produced `previousOutput`. */
  previousSource?: JsonValue;
  /**
   * Decides whether `text` is what produced `previousValue`. Consulted only
   * when no previous source document is available.
   */
  producedBy?: (text: string, previousValue: string, path: LeafPath) => boolean | Promise<boolean>;
}

export interface DiffSelection {
  /** Leaf keys that must be translated again. */
  changed: Set<string>;
  /** Leaf keys whose previous translation is carried over, with that value. */
  reused: Map<string, string>;
  /** Subtrees whose shape no longer matches the previous output. */
  diverged: LeafPath[];
}

type ShapeKind = 'array' | 'object' | 'scalar' | 'missing';

function shapeOf(value: JsonValue | undefined): ShapeKind {
  if (value === undefined) {
    return 'missing';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return isJsonObject(value) ? 'object' : 'scalar';
}

function childOf(value: JsonValue | undefined, segment: LeafPathSegment): JsonValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof segment === 'number') {
    return Array.isArray(value) && segment < value.length ? value[segment] : undefined;
  }
  if (isJsonObject(value) && Object.prototype.hasOwnProperty.call(value, segment)) {
    return value[segment];
  }
  return undefined;
}

function sameShape(current: JsonValue, previous: JsonValue | undefined): boolean {
  const kind = shapeOf(current);
  if (kind !== shapeOf(previous)) {
    return false;
  }
  if (Array.isArray(current) && Array.isArray(previous)) {
    return current.length === previous.length;
  }
  return true;
}

/**
 * Compare a new source document against the output of a previous run and
 * pick the leaves that need translating. Leaves not selected keep their
 * previous translation verbatim.
 */
export async function selectChangedLeaves(
  previousOutput: JsonValue | undefined,
  newInput: JsonValue,
  options: DiffSelectionOptions = {}
): Promise<DiffSelection> {
  const selection: DiffSelection = { changed: new Set(), reused: new Map(), diverged: [] };
  const hasPreviousSource = options.previousSource !== undefined;

  const markAll = (node: JsonValue, path: LeafPathSegment[]): void => {
    if (Array.isArray(node)) {
      node.forEach((item, index) => markAll(item, [...path, index]));
    } else if (isJsonObject(node)) {
      for (const [key, value] of Object.entries(node)) {
        markAll(value, [...path, key]);
      }
    } else if (isTranslatableText(node)) {
      selection.changed.add(toLeafKey(path));
    }
  };

  const walk = async (
    node: JsonValue,
    previous: JsonValue | undefined,
    previousSource: JsonValue | undefined,
    path: LeafPathSegment[]
  ): Promise<void> => {
    if (previous === undefined) {
      markAll(node, path);
      return;
    }

    const outputDiverged = !sameShape(node, previous);
    const sourceDiverged = hasPreviousSource && previousSource !== undefined && !sameShape(node, previousSource);
    if (outputDiverged || sourceDiverged) {
      if (shapeOf(node) !== 'scalar' || shapeOf(previous) !== 'scalar') {
        selection.diverged.push(path);
      }
      markAll(node, path);
      return;
    }

    if (Array.isArray(node)) {
      for (let index = 0; index < node.length; index += 1) {
        await walk(node[index], childOf(previous, index), childOf(previousSource, index), [...path, index]);
      }
      return;
    }

    if (isJsonObject(node)) {
      for (const [key, value] of Object.entries(node)) {
        await walk(value, childOf(previous, key), childOf(previousSource, key), [...path, key]);
      }
      return;
    }

    if (!isTranslatableText(node)) {
      return;
    }

    const key = toLeafKey(path);
    if (typeof previous !== 'string') {
      selection.changed.add(key);
      return;
    }

    let unchanged: boolean;
    if (hasPreviousSource) {
      unchanged = previousSource === node;
    } else if (options.producedBy) {
      unchanged = await options.producedBy(node, previous, path);
    } else {
      unchanged = true;
    }

    if (unchanged) {
      selection.reused.set(key, previous);
    } else {
      selection.changed.add(key);
    }
  };

  await walk(newInput, previousOutput, options.previousSource, []);
  return selection;
}
