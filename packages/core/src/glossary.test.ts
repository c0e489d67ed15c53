import { describe, expect, it } from 'vitest';
import { applyGlossary, normalizeGlossaryRules } from './glossary.js';

describe('applyGlossary', () => {
  it('lets later rules rewrite earlier output', () => {
    const rules = [
      { source: 'car', target: 'auto' },
      { source: 'auto', target: 'coche' },
    ];
    expect(applyGlossary('car', rules)).toBe('coche');
  });

  it('matches whole words case-insensitively', () => {
    const rules = [{ source: 'app', target: 'Transjson' }];
    expect(applyGlossary('Open the APP, not the application or app_id', rules)).toBe(
      'Open the Transjson, not the application or app_id'
    );
  });

  it('treats accented letters as word characters', () => {
    const rules = [{ source: 'caf', target: 'X' }];
    expect(applyGlossary('café caf', rules)).toBe('café X');
  });

  it('never rewrites placeholder tokens', () => {
    const rules = [{ source: 'name', target: 'nombre' }];
    expect(applyGlossary('{{name}} and {name}: name', rules)).toBe('{{name}} and {name}: nombre');
  });

  it('inserts targets literally', () => {
    const rules = [{ source: 'price', target: '$& total' }];
    expect(applyGlossary('price', rules)).toBe('$& total');
  });

  it('matches terms with regex characters', () => {
    const rules = [{ source: 'C++', target: 'C plus plus' }];
    expect(applyGlossary('I write C++ daily', rules)).toBe('I write C plus plus daily');
  });
});

describe('normalizeGlossaryRules', () => {
  it('accepts maps, objects and pairs in declared order', () => {
    expect(normalizeGlossaryRules({ car: 'auto', ' ': 'x' })).toEqual([{ source: 'car', target: 'auto' }]);
    expect(normalizeGlossaryRules([{ source: ' car ', target: 'auto' }, ['auto', 'coche'], ['bad']])).toEqual([
      { source: 'car', target: 'auto' },
      { source: 'auto', target: 'coche' },
    ]);
    expect(normalizeGlossaryRules('nonsense')).toEqual([]);
  });
});
