import type { Appliance, CategoryPower, StepRecord, SystemConfig, TaskInstance } from "../../schema.js";

export const makeConfig = (overrides: Partial<SystemConfig> = {}): SystemConfig => ({
  locationName: "Test site",
  latitude: 0,
  longitude: 0,
  pvCapacityKw: 3,
  pvEfficiency: 1,
  batteryCapacityKwh: 10,
  socMin: 0.2,
  socMax: 0.9,
  socInitial: 0.5,
  chargeEfficiency: 0.95,
  dischargeEfficiency: 0.95,
  inverterMaxKw: 5,
  timestepMinutes: 15,
  reserveSoc: 0.3,
  horizonSteps: 4,
  ...overrides,
});

export const makeAppliance = (overrides: Partial<Appliance> & Pick<Appliance, "id" | "category">): Appliance => ({
  name: overrides.id,
  powerW: 100,
  quantity: 1,
  ...overrides,
});

export const makeTask = (
  overrides: Partial<TaskInstance> & Pick<TaskInstance, "id" | "category" | "powerKw">,
): TaskInstance => ({
  applianceId: overrides.id,
  name: overrides.id,
  earliestStartStep: 0,
  latestEndStep: 96,
  durationSteps: 4,
  remainingSteps: 4,
  served: false,
  ...overrides,
});

const power = (critical = 0, flexible = 0, deferrable = 0): CategoryPower => ({ critical, flexible, deferrable });

export type RecordSeries = {
  readonly pvKw: readonly number[];
  readonly criticalKw: readonly number[];
  readonly servedCriticalKw?: readonly number[];
  readonly flexibleKw?: readonly number[];
};

/** Hourly records starting 2030-01-01T00:00Z, for matching over a 60 minute grid. */
export const hourlyRecords = (series: RecordSeries): StepRecord[] =>
  series.pvKw.map((pvKw, stepIndex) => {
    const critical = series.criticalKw[stepIndex] ?? 0;
    const flexible = series.flexibleKw?.[stepIndex] ?? 0;

    return {
      stepIndex,
      day: 0,
      timestamp: new Date(Date.UTC(2030, 0, 1, stepIndex)).toISOString(),
      pvKw,
      soc: 0.5,
      requested: power(critical, flexible),
      served: power(series.servedCriticalKw?.[stepIndex] ?? critical, flexible),
      servedTaskIds: [],
      deferredTaskIds: [],
      shedTaskIds: [],
      chargeKw: 0,
      dischargeKw: 0,
      curtailedKw: 0,
      blackout: false,
      riskLevel: "low",
      reasonCodes: [],
      kpis: {
        clsr: 1,
        blackoutMinutes: 0,
        sar: 0,
        solarUtilization: 0,
        batteryThroughputKwh: 0,
        curtailedKwh: 0,
      },
    };
  });

export const constant = (length: number, value: number): number[] => new Array<number>(length).fill(value);
