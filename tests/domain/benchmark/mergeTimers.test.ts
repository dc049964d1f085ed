import { mergeTimers } from '../../../src/domain/benchmark/mergeTimers';
import { Timer } from '../../../src/domain/benchmark/Timer';
import { IncompleteBenchmarkError } from '../../../src/domain/benchmark/errors';
import { SequenceClock } from '../../helpers/SequenceClock';

function finished(capacity: number, readings: number[]): Timer {
  const timer = new Timer(capacity, { clock: new SequenceClock(readings) });
  while (timer.next()) {
    // no work
  }
  return timer;
}

describe('mergeTimers', () => {
  test('returns undefined for no timers', () => {
    expect(mergeTimers()).toBeUndefined();
  });

  test('concatenates laps and spans earliest start to latest stop', () => {
    const a = finished(2, [0, 10, 30, 31]);
    const b = finished(1, [100, 105]);

    const merged = mergeTimers(a, b);
    expect(merged).toBeDefined();
    if (!merged) return;

    expect(merged.laps()).toEqual([10, 20, 5]);
    expect(merged.start).toBe(0);
    expect(merged.stop).toBe(105);
    expect(merged.count).toBe(3);
    expect(merged.capacity).toBe(3);
    expect(merged.isFinalized).toBe(true);
    expect(merged.elapsed()).toBe(105);
  });

  test('keeps argument order', () => {
    const a = finished(2, [0, 10, 30]);
    const b = finished(1, [100, 105]);

    expect(mergeTimers(b, a)?.laps()).toEqual([5, 10, 20]);
  });

  test('merged timer cannot be driven further', () => {
    const a = finished(1, [0, 10, 11]);
    const merged = mergeTimers(a);

    expect(merged?.next()).toBe(false);
    expect(merged?.laps()).toEqual([10]);
    expect(merged?.stop).toBe(10);
  });

  test('leaves inputs untouched', () => {
    const a = finished(2, [0, 10, 30]);
    const b = finished(1, [100, 105]);
    mergeTimers(a, b);

    expect(a.laps()).toEqual([10, 20]);
    expect(a.start).toBe(0);
    expect(a.stop).toBe(30);
    expect(b.laps()).toEqual([5]);
  });

  test('rejects timers that are not finalized', () => {
    const done = finished(1, [0, 1]);
    const pending = new Timer(1, { clock: new SequenceClock([0]) });
    pending.next();

    expect(() => mergeTimers(done, pending)).toThrow(IncompleteBenchmarkError);
  });

  test('merged laps feed a single histogram', () => {
    const a = finished(2, [0, 10, 30]);
    const b = finished(2, [0, 15, 20]);

    const hist = mergeTimers(a, b)?.histogram(4);
    expect(hist?.count).toBe(4);
    expect(hist?.minimum).toBe(5);
    expect(hist?.maximum).toBe(20);
  });
});
