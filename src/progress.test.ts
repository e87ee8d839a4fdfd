import { describe, it, expect, vi } from 'vitest';
import { createProgressTracker } from './progress.js';

function milestonesFor(total: number, steps = total): number[] {
  const seen: number[] = [];
  const tracker = createProgressTracker(total, (percent) => seen.push(percent));
  for (let i = 0; i < steps; i++) tracker.advance();
  return seen;
}

describe('createProgressTracker', () => {
  it('reports every decile once when work advances in small steps', () => {
    expect(milestonesFor(100)).toEqual([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);
    expect(milestonesFor(16)).toEqual([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);
  });

  it('reports every decile crossed when a step jumps over several', () => {
    const all = [10, 20, 30, 40, 50, 60, 70, 80, 90, 100];
    expect(milestonesFor(4)).toEqual(all);
    expect(milestonesFor(3)).toEqual(all);
    expect(milestonesFor(1)).toEqual(all);
  });

  it('reports the skipped deciles before the one reached', () => {
    const seen: number[] = [];
    const tracker = createProgressTracker(3, (percent) => seen.push(percent));

    tracker.advance();
    expect(seen).toEqual([10, 20, 30]);
    tracker.advance();
    expect(seen).toEqual([10, 20, 30, 40, 50, 60]);
  });

  it('never reports 0%', () => {
    expect(milestonesFor(1000, 99)).toEqual([]);
    expect(milestonesFor(1000, 100)).toEqual([10]);
  });

  it('counts completed work', () => {
    const onMilestone = vi.fn();
    const tracker = createProgressTracker(50, onMilestone);
    for (let i = 0; i < 7; i++) tracker.advance();

    expect(tracker.completed).toBe(7);
    expect(onMilestone).toHaveBeenCalledTimes(1);
    expect(onMilestone).toHaveBeenCalledWith(10);
  });
});
