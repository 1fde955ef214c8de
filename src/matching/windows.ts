import type { StepRange } from "../load/load-demand-model.js";
import type { TimeWindow } from "../schema.js";

export type FlagRun = {
  readonly startStep: number;
  readonly endStep: number; // inclusive
  readonly flag: boolean;
};

/** Collapses a flag series into maximal runs of equal flags, in order. */
export const mergeFlagRuns = (flags: readonly boolean[]): FlagRun[] => {
  const runs: FlagRun[] = [];
  let startStep = 0;

  flags.forEach((flag, step) => {
    const next = flags[step + 1];
    if (next === undefined || next !== flag) {
      runs.push({ startStep, endStep: step, flag });
      startStep = step + 1;
    }
  });

  return runs;
};

/**
 * Windows over the steps whose flag is set. `timestamps` holds one ISO
 * timestamp per step; a window ends where its last step ends.
 */
export const buildWindows = (
  flags: readonly boolean[],
  label: TimeWindow["label"],
  timestamps: readonly string[],
  timestepMinutes: number,
): TimeWindow[] =>
  mergeFlagRuns(flags)
    .filter((run) => run.flag)
    .map((run) => {
      const start = timestamps[run.startStep] ?? "";
      const lastStepStart = Date.parse(timestamps[run.endStep] ?? start);

      return {
        startStep: run.startStep,
        endStep: run.endStep,
        start,
        end: new Date(lastStepStart + timestepMinutes * 60_000).toISOString(),
        label,
      };
    });

export const windowLengthSteps = (window: TimeWindow): number => window.endStep - window.startStep + 1;

// Steps of `window` that fall inside `range`; 0 when they do not meet.
export const overlapSteps = (window: TimeWindow, range: StepRange): number =>
  Math.max(0, Math.min(window.endStep + 1, range.endStep) - Math.max(window.startStep, range.startStep));

const clockTime = (minutes: number) => {
  const hours = Math.floor(minutes / 60);
  return `${String(hours).padStart(2, "0")}:${String(minutes % 60).padStart(2, "0")}`;
};

/** "HH:MM–HH:MM" measured from the start of the day; a window may end at 24:00. */
export const formatWindowTime = (window: TimeWindow, timestepMinutes: number): string =>
  `${clockTime(window.startStep * timestepMinutes)}–${clockTime((window.endStep + 1) * timestepMinutes)}`;
