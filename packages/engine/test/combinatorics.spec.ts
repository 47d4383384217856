import { describe, expect, it } from 'vitest';
import { findSubsetsWithSum, partitionExactSums, selectMaximalDisjointSets } from '../src';

const identity = (value: number) => value;
const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);

describe('findSubsetsWithSum', () => {
  it('lists every multi-item subset hitting the target, largest items first', () => {
    expect(findSubsetsWithSum([3, 4, 5, 2, 1], 7, identity, 2)).toEqual([
      [5, 2],
      [4, 3],
      [4, 2, 1],
    ]);
  });

  it('includes single items when the minimum size allows it', () => {
    expect(findSubsetsWithSum([5, 3, 2], 5, identity)).toEqual([[5], [3, 2]]);
  });

  it('returns nothing when the items cannot reach the target', () => {
    expect(findSubsetsWithSum([1, 2, 3], 10, identity)).toEqual([]);
    expect(findSubsetsWithSum([], 4, identity)).toEqual([]);
    expect(findSubsetsWithSum([4], 0, identity)).toEqual([]);
  });

  it('treats equal values as distinct items', () => {
    const items = [
      { id: 'a', value: 2 },
      { id: 'b', value: 2 },
      { id: 'c', value: 2 },
    ];
    const found = findSubsetsWithSum(items, 4, (item) => item.value, 2);
    expect(found.map((subset) => subset.map((item) => item.id))).toEqual([
      ['a', 'b'],
      ['a', 'c'],
      ['b', 'c'],
    ]);
  });
});

describe('partitionExactSums', () => {
  it('splits items into the fewest groups of the target sum', () => {
    expect(partitionExactSums([4, 4, 8], 8, identity)).toEqual([[8], [4, 4]]);
  });

  it('finds a partition when the greedy first placement is not final', () => {
    const groups = partitionExactSums([6, 3, 6, 3], 9, identity);
    expect(groups).toEqual([
      [6, 3],
      [6, 3],
    ]);
  });

  it('every group of a found partition sums to the target', () => {
    const groups = partitionExactSums([1, 2, 3, 4, 5, 5, 7, 3], 10, identity);
    expect(groups).not.toBeNull();
    expect(groups?.length).toBe(3);
    for (const group of groups ?? []) {
      expect(sum(group)).toBe(10);
    }
    expect((groups ?? []).flat().sort()).toEqual([1, 2, 3, 3, 4, 5, 5, 7]);
  });

  it('rejects totals that are not a multiple of the target', () => {
    expect(partitionExactSums([4, 3], 5, identity)).toBeNull();
  });

  it('rejects items larger than the target', () => {
    expect(partitionExactSums([5, 4], 3, identity)).toBeNull();
  });

  it('reports impossible when no arrangement works', () => {
    expect(partitionExactSums([6, 6, 4, 2], 9, identity)).toBeNull();
  });

  it('returns no groups for no items', () => {
    expect(partitionExactSums([], 7, identity)).toEqual([]);
  });
});

describe('selectMaximalDisjointSets', () => {
  const key = (value: string) => value;

  it('returns every largest selection of non-overlapping sets', () => {
    expect(
      selectMaximalDisjointSets(
        [
          ['a', 'b'],
          ['b', 'c'],
          ['d'],
        ],
        key,
      ),
    ).toEqual([
      [['a', 'b'], ['d']],
      [['b', 'c'], ['d']],
    ]);
  });

  it('takes all sets together when none overlap', () => {
    expect(selectMaximalDisjointSets([['a'], ['b', 'c']], key)).toEqual([[['a'], ['b', 'c']]]);
  });

  it('prefers the selection covering more items', () => {
    expect(
      selectMaximalDisjointSets(
        [
          ['x', 'y'],
          ['x', 'z', 'w'],
        ],
        key,
      ),
    ).toEqual([[['x', 'z', 'w']]]);
  });

  it('returns nothing for no sets', () => {
    expect(selectMaximalDisjointSets([], key)).toEqual([]);
  });
});
