import { describe, expect, it, vi } from 'vitest';
import { selectChangedLeaves } from './diff-engine.js';
import { toLeafKey, type JsonValue } from './tree-walker.js';

const previousSource: JsonValue = {
  title: 'Welcome',
  nav: { home: 'Home', about: 'About us' },
  items: ['One', 'Two'],
  count: 3,
};

const previousOutput: JsonValue = {
  title: 'Bienvenido',
  nav: { home: 'Inicio', about: 'Sobre nosotros' },
  items: ['Uno', 'Dos'],
  count: 3,
};

describe('selectChangedLeaves', () => {
  it('selects exactly the edited leaf', async () => {
    const input: JsonValue = {
      title: 'Welcome',
      nav: { home: 'Home', about: 'About' },
      items: ['One', 'Two'],
      count: 3,
    };

    const selection = await selectChangedLeaves(previousOutput, input, { previousSource });

    expect(Array.from(selection.changed)).toEqual([toLeafKey(['nav', 'about'])]);
    expect(selection.reused.get(toLeafKey(['title']))).toBe('Bienvenido');
    expect(selection.reused.get(toLeafKey(['items', 1]))).toBe('Dos');
    expect(selection.reused.size).toBe(4);
    expect(selection.diverged).toEqual([]);
  });

  it('selects leaves missing from the previous output', async () => {
    const input: JsonValue = { ...previousSource, footer: 'Contact' };

    const selection = await selectChangedLeaves(previousOutput, input, { previousSource });

    expect(Array.from(selection.changed)).toEqual([toLeafKey(['footer'])]);
  });

  it('marks a resized array as diverged', async () => {
    const input: JsonValue = { ...previousSource, items: ['One', 'Two', 'Three'] };

    const selection = await selectChangedLeaves(previousOutput, input, { previousSource });

    expect(selection.diverged).toEqual([['items']]);
    expect(Array.from(selection.changed)).toEqual([
      toLeafKey(['items', 0]),
      toLeafKey(['items', 1]),
      toLeafKey(['items', 2]),
    ]);
  });

  it('marks a container replaced by a scalar as diverged', async () => {
    const input: JsonValue = { ...previousSource, nav: 'Navigation' };

    const selection = await selectChangedLeaves(previousOutput, input, { previousSource });

    expect(selection.diverged).toEqual([['nav']]);
    expect(Array.from(selection.changed)).toEqual([toLeafKey(['nav'])]);
  });

  it('asks producedBy when no previous source is available', async () => {
    const producedBy = vi.fn(async (text: string, previousValue: string) => {
      return !(text === 'About us' && previousValue === 'Sobre nosotros');
    });

    const selection = await selectChangedLeaves(previousOutput, previousSource, { producedBy });

    expect(producedBy).toHaveBeenCalledTimes(5);
    expect(Array.from(selection.changed)).toEqual([toLeafKey(['nav', 'about'])]);
  });

  it('treats existing strings as unchanged without any reference', async () => {
    const selection = await selectChangedLeaves(previousOutput, previousSource);

    expect(selection.changed.size).toBe(0);
    expect(selection.reused.size).toBe(5);
  });

  it('selects every leaf when there is no previous output', async () => {
    const selection = await selectChangedLeaves(undefined, previousSource);

    expect(selection.changed.size).toBe(5);
    expect(selection.reused.size).toBe(0);
    expect(selection.diverged).toEqual([]);
  });

  it('retranslates a leaf whose previous value is not a string', async () => {
    const selection = await selectChangedLeaves({ title: 42 }, { title: 'Welcome' }, {
      previousSource: { title: 'Welcome' },
    });

    expect(Array.from(selection.changed)).toEqual([toLeafKey(['title'])]);
    expect(selection.diverged).toEqual([]);
  });
});
