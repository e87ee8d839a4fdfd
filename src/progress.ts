export interface ProgressTracker {
  /** Count one more finished unit of work. */
  advance(): void;
  readonly completed: number;
}

/**
 * Report progress in 10% steps. A milestone fires the first time it is
 * reached and never again; a step that jumps over several deciles reports
 * each of them in order. 0% is never reported.
 */
export function createProgressTracker(
  total: number,
  onMilestone: (percent: number) => void,
): ProgressTracker {
  let completed = 0;
  let lastReported = 0;

  return {
    advance() {
      completed++;
      const percent = Math.floor((completed * 100) / total);
      const milestone = Math.floor(percent / 10) * 10;
      while (lastReported < milestone) {
        lastReported += 10;
        onMilestone(lastReported);
      }
    },
    get completed() {
      return completed;
    },
  };
}
