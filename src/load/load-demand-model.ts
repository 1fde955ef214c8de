import {
  LOAD_CATEGORIES,
  type Appliance,
  type CategoryPower,
  type LoadCategory,
  type TaskInstance,
} from "../schema.js";

// Daily run time for appliances that do not set runHours.
export const DEFAULT_RUN_HOURS: Readonly<Record<Exclude<LoadCategory, "critical">, number>> = {
  flexible: 4,
  deferrable: 2,
};

export type StepRange = {
  readonly startStep: number;
  readonly endStep: number; // exclusive
};

export const emptyCategoryPower = (): CategoryPower => ({ critical: 0, flexible: 0, deferrable: 0 });

export const totalPower = (power: CategoryPower): number => power.critical + power.flexible + power.deferrable;

export const appliancePowerKw = (appliance: Appliance): number => (appliance.powerW * appliance.quantity) / 1000;

const hourToStep = (hour: number, timestepMinutes: number) => Math.round((hour * 60) / timestepMinutes);

/** Steps of the day in which an appliance may run. Critical loads are always on. */
export const applianceStepRange = (appliance: Appliance, timestepMinutes: number): StepRange => {
  const stepsPerDay = 1440 / timestepMinutes;

  if (appliance.category === "critical" || appliance.window === undefined) {
    return { startStep: 0, endStep: stepsPerDay };
  }

  const startStep = Math.min(stepsPerDay - 1, hourToStep(appliance.window.startHour, timestepMinutes));
  const endStep = Math.min(stepsPerDay, Math.max(startStep + 1, hourToStep(appliance.window.endHour, timestepMinutes)));

  return { startStep, endStep };
};

export const applianceDurationSteps = (appliance: Appliance, timestepMinutes: number): number => {
  const range = applianceStepRange(appliance, timestepMinutes);
  const windowSteps = range.endStep - range.startStep;

  if (appliance.category === "critical") {
    return windowSteps;
  }

  const runHours = appliance.runHours ?? DEFAULT_RUN_HOURS[appliance.category];
  return Math.min(windowSteps, Math.max(1, hourToStep(runHours, timestepMinutes)));
};

/** Expands each appliance template into one task for the given simulated day. */
export const buildDailyTasks = (
  appliances: readonly Appliance[],
  day: number,
  timestepMinutes: number,
): TaskInstance[] =>
  appliances.map((appliance) => {
    const range = applianceStepRange(appliance, timestepMinutes);
    const durationSteps = applianceDurationSteps(appliance, timestepMinutes);

    return {
      id: `${appliance.id}@d${day}`,
      applianceId: appliance.id,
      name: appliance.name,
      category: appliance.category,
      powerKw: appliancePowerKw(appliance),
      earliestStartStep: range.startStep,
      latestEndStep: range.endStep,
      durationSteps,
      remainingSteps: durationSteps,
      served: false,
    };
  });

export const isTaskActive = (task: TaskInstance, step: number): boolean =>
  !task.served && task.earliestStartStep <= step && step < task.latestEndStep;

export const requestedForStep = (
  tasks: readonly TaskInstance[],
  step: number,
  category: LoadCategory,
): number =>
  tasks.reduce(
    (sum, task) => (task.category === category && isTaskActive(task, step) ? sum + task.powerKw : sum),
    0,
  );

export const requestedByCategory = (tasks: readonly TaskInstance[], step: number): CategoryPower => ({
  critical: requestedForStep(tasks, step, "critical"),
  flexible: requestedForStep(tasks, step, "flexible"),
  deferrable: requestedForStep(tasks, step, "deferrable"),
});

export const catalogMaximumByCategory = (appliances: readonly Appliance[]): CategoryPower => {
  const maximum = emptyCategoryPower();

  return LOAD_CATEGORIES.reduce(
    (acc, category) => ({
      ...acc,
      [category]: appliances
        .filter((appliance) => appliance.category === category)
        .reduce((sum, appliance) => sum + appliancePowerKw(appliance), 0),
    }),
    maximum,
  );
};

/** Counts one served step against every task in `servedTaskIds`. */
export const advanceTasks = (
  tasks: readonly TaskInstance[],
  servedTaskIds: readonly string[],
): TaskInstance[] => {
  const served = new Set(servedTaskIds);

  return tasks.map((task) => {
    if (!served.has(task.id) || task.served) {
      return task;
    }

    const remainingSteps = Math.max(0, task.remainingSteps - 1);
    return { ...task, remainingSteps, served: remainingSteps === 0 };
  });
};
