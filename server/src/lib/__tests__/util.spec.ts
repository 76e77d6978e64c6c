import test from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  currentYearMonth,
  isYearMonth,
  mapWithConcurrency,
  parseYearMonth,
  roundedCoordinateKey,
  shiftYearMonth,
  yearMonthsBack,
} from '../util';

test('yearMonthsBack lists months newest first across a year boundary', () => {
  assert.deepEqual(yearMonthsBack('202501', 3), ['202501', '202412', '202411']);
  assert.deepEqual(yearMonthsBack('202403', 1), ['202403']);
  assert.deepEqual(yearMonthsBack('202403', 0), []);
});

test('shiftYearMonth rolls over in both directions', () => {
  assert.deepEqual(shiftYearMonth({ year: 2024, month: 12 }, 1), { year: 2025, month: 1 });
  assert.deepEqual(shiftYearMonth({ year: 2024, month: 1 }, -13), { year: 2022, month: 12 });
  assert.deepEqual(shiftYearMonth({ year: 2024, month: 6 }, 0), { year: 2024, month: 6 });
});

test('parseYearMonth rejects malformed values', () => {
  assert.deepEqual(parseYearMonth(' 202407 '), { year: 2024, month: 7 });
  assert.throws(() => parseYearMonth('202413'), /Invalid month/);
  assert.throws(() => parseYearMonth('2024-07'), /expected YYYYMM/);
  assert.equal(isYearMonth('202400'), false);
  assert.equal(isYearMonth('202401'), true);
});

test('currentYearMonth follows Korean time', () => {
  assert.equal(currentYearMonth(new Date('2024-12-31T14:59:00Z')), '202412');
  assert.equal(currentYearMonth(new Date('2024-12-31T15:30:00Z')), '202501');
});

test('roundedCoordinateKey rounds to six decimals', () => {
  assert.equal(roundedCoordinateKey({ lat: 37.56650049, lon: 126.978 }), '37.566500,126.978000');
});

test('mapWithConcurrency keeps input order and respects the limit', async () => {
  let active = 0;
  let peak = 0;
  const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (delay, index) => {
    active += 1;
    peak = Math.max(peak, active);
    await sleep(delay);
    active -= 1;
    return `${index}:${delay}`;
  });

  assert.deepEqual(results, ['0:30', '1:5', '2:20', '3:1', '4:10']);
  assert.equal(peak, 2);
});

test('mapWithConcurrency handles an empty list', async () => {
  assert.deepEqual(await mapWithConcurrency([], 4, async () => 1), []);
});
