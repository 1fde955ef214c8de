import type { ApplianceInput, IrradiancePoint, SystemConfigInput } from "../../../schema.js";
import type { SimulationOptions } from "../../../simulation/simulation-loop.js";

export const START_AT = new Date("2030-01-01T00:00:00.000Z");

export const flatIrradiance = (ghiWm2: number, days = 1): IrradiancePoint[] =>
  Array.from({ length: 24 * days }, (_, hour) => ({
    timestamp: new Date(START_AT.getTime() + hour * 3_600_000).toISOString(),
    ghiWm2,
  }));

export const scenarioSystem: SystemConfigInput = {
  pvCapacityKw: 3,
  batteryCapacityKwh: 5,
  socMin: 0.1,
  socMax: 0.95,
  socInitial: 0.5,
  inverterMaxKw: 3,
  timestepMinutes: 15,
  reserveSoc: 0.2,
};

export const criticalOnly = (powerW: number): ApplianceInput[] => [
  { id: "essentials", name: "Essentials", category: "critical", powerW },
];

export const lowSolarOptions = (): Omit<SimulationOptions, "controller"> => ({
  config: { ...scenarioSystem, pvCapacityKw: 2, socInitial: 0.6, reserveSoc: 0.3 },
  appliances: [
    { id: "lights", name: "Lights", category: "critical", powerW: 100 },
    { id: "heater", name: "Water heater", category: "flexible", powerW: 1000, runHours: 8 },
    { id: "washer", name: "Washing machine", category: "deferrable", powerW: 500, runHours: 4 },
  ],
  days: 1,
  startAt: START_AT,
  forecast: flatIrradiance(50),
});
