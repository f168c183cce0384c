import { describe, expect, it } from 'vitest';
import { ValueSet } from './value-set';

interface Ref {
  id: string;
  name: string;
}

const refSet = (values: Ref[] = []) => new ValueSet<Ref>((r) => JSON.stringify([r.id, r.name]), values);

describe('ValueSet', () => {
  it('counts equal records once', () => {
    const set = refSet([
      { id: 'a', name: 'A' },
      { id: 'a', name: 'A' },
    ]);

    expect(set.size).toBe(1);
    expect(set.sortedValues()).toEqual([{ id: 'a', name: 'A' }]);
  });

  it('builds a union without touching the operands', () => {
    const left = refSet([{ id: 'b', name: 'B' }]);
    const right = refSet([
      { id: 'a', name: 'A' },
      { id: 'b', name: 'B' },
    ]);

    const union = left.union(right);

    expect(union.sortedValues()).toEqual([
      { id: 'a', name: 'A' },
      { id: 'b', name: 'B' },
    ]);
    expect(left.size).toBe(1);
    expect(right.size).toBe(2);
  });

  it('clones members with the given copier', () => {
    const original = refSet([{ id: 'a', name: 'A' }]);

    const copy = original.clone((r) => ({ ...r }));
    copy.add({ id: 'b', name: 'B' });
    const [copied] = copy.sortedValues();
    copied.name = 'renamed';

    expect(original.sortedValues()).toEqual([{ id: 'a', name: 'A' }]);
    expect(copy.size).toBe(2);
  });
});
