import assert from 'node:assert/strict';
import { test } from 'node:test';

import { reciprocalRankFusion, type RankedItem } from '../src';

const ranking = (...ids: string[]): RankedItem<string>[] => ids.map((id) => ({ id, item: id.toUpperCase() }));

test('sums 1/(k + rank) across rankings and breaks ties by id', () => {
  const fused = reciprocalRankFusion([ranking('a', 'b', 'c'), ranking('b', 'a'), ranking('c')]);

  assert.deepEqual(
    fused.map((entry) => entry.id),
    ['a', 'b', 'c']
  );
  assert.equal(fused[0].score, 1 / 61 + 1 / 62);
  assert.equal(fused[1].score, 1 / 62 + 1 / 61);
  assert.equal(fused[2].score, 1 / 63 + 1 / 61);
  assert.deepEqual(
    fused.map((entry) => entry.rank),
    [1, 2, 3]
  );
  assert.equal(fused[2].item, 'C');
});

test('fused order is reproducible for the same rankings', () => {
  const rankings = [ranking('x', 'y', 'z', 'w'), ranking('w', 'z'), ranking('y', 'w', 'x')];
  const first = reciprocalRankFusion(rankings);
  const second = reciprocalRankFusion(rankings);
  assert.deepEqual(first, second);
  assert.deepEqual(
    first.map((entry) => entry.id),
    ['w', 'y', 'x', 'z']
  );
});

test('applies the limit after sorting', () => {
  const fused = reciprocalRankFusion([ranking('d', 'c', 'b', 'a')], { limit: 2 });
  assert.deepEqual(
    fused.map((entry) => [entry.id, entry.rank]),
    [
      ['d', 1],
      ['c', 2]
    ]
  );
});

test('counts an id once per ranking', () => {
  const fused = reciprocalRankFusion([ranking('a', 'a', 'b')], { k: 10 });
  assert.equal(fused.length, 2);
  assert.equal(fused[0].score, 1 / 11);
  assert.equal(fused[1].score, 1 / 13);
});

test('returns nothing for empty rankings', () => {
  assert.deepEqual(reciprocalRankFusion([[], []]), []);
});
