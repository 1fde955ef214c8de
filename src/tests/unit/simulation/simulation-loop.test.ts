import { describe, it, vitest, beforeEach, expect } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Effect } from "effect";
import { CONTROLLER_KINDS, type ControllerInput } from "../../../controller/types.js";
import type { SimulationEventLogger } from "../../../event-logger/types.js";
import { catalogMaximumByCategory } from "../../../load/load-demand-model.js";
import { LOAD_CATEGORIES, type Decision } from "../../../schema.js";
import { runDigitalTwin } from "../../../simulation/digital-twin.js";
import { makeSimulation, SimulationLoop } from "../../../simulation/simulation-loop.js";
import { makeConfig } from "../fixtures.js";
import { criticalOnly, flatIrradiance, lowSolarOptions, scenarioSystem, START_AT } from "./scenarios.js";

describe("SimulationLoop", () => {
  const eventLoggerMock: MockedObject<SimulationEventLogger> = {
    onRunStarted: vitest.fn(),
    onForecastFallback: vitest.fn(),
    onBlackout: vitest.fn(),
    onDayCompleted: vitest.fn(),
    onRunCompleted: vitest.fn(),
  };

  beforeEach(() => {
    vitest.clearAllMocks();
    eventLoggerMock.onRunStarted.mockReturnValue(Effect.void);
    eventLoggerMock.onForecastFallback.mockReturnValue(Effect.void);
    eventLoggerMock.onBlackout.mockReturnValue(Effect.void);
    eventLoggerMock.onDayCompleted.mockReturnValue(Effect.void);
    eventLoggerMock.onRunCompleted.mockReturnValue(Effect.void);
  });

  describe("scenarios", () => {
    it.effect("should protect critical load with ample solar", () =>
      Effect.gen(function* () {
        const result = yield* runDigitalTwin({
          config: scenarioSystem,
          appliances: criticalOnly(1000),
          controller: "rule_based",
          days: 1,
          startAt: START_AT,
          forecast: flatIrradiance(500),
          eventLogger: eventLoggerMock,
        });

        expect(result.status).toBe("completed");
        expect(result.matching.criticalFullyProtected).toBe(true);
        expect(result.matching.marginType).toBe("surplus");
        expect(result.matching.riskLevel).toBe("low");
        expect(result.matching.totalSolarKwh).toBe(36);
        expect(result.matching.totalDemandKwh).toBe(24);
        expect(result.finalKpis.blackoutMinutes).toBe(0);
        expect(result.finalKpis.clsr).toBe(1);
      })
    );

    it.effect("should record blackout when critical load exceeds supply", () =>
      Effect.gen(function* () {
        const result = yield* runDigitalTwin({
          config: { ...scenarioSystem, pvCapacityKw: 1 },
          appliances: criticalOnly(4000),
          controller: "rule_based",
          days: 1,
          startAt: START_AT,
          forecast: flatIrradiance(500),
          eventLogger: eventLoggerMock,
        });

        expect(result.finalKpis.blackoutMinutes).toBeGreaterThan(0);
        expect(result.finalKpis.clsr).toBeLessThan(1);
        expect(result.matching.criticalFullyProtected).toBe(false);
        expect(result.matching.riskLevel).toBe("high");
      })
    );

    it.effect("should end a low-solar day with more charge under rule_based than naive", () =>
      Effect.gen(function* () {
        const naive = yield* runDigitalTwin({ ...lowSolarOptions(), controller: "naive", eventLogger: eventLoggerMock });
        const ruleBased = yield* runDigitalTwin({ ...lowSolarOptions(), controller: "rule_based", eventLogger: eventLoggerMock });

        expect(naive.endSoc).toBeLessThan(ruleBased.endSoc);
        expect(ruleBased.endSoc).toBeGreaterThanOrEqual(0.3 - 1e-6);
      })
    );
  });

  describe("invariants", () => {
    const mixedHousehold = {
      config: { ...scenarioSystem, reserveSoc: 0.3 },
      appliances: [
        { id: "fridge", name: "Refrigerator", category: "critical" as const, powerW: 200 },
        { id: "tv", name: "Television", category: "flexible" as const, powerW: 800, window: { startHour: 17, endHour: 23 }, runHours: 3 },
        { id: "laptop", name: "Laptop", category: "flexible" as const, powerW: 100, quantity: 2 },
        { id: "washer", name: "Washing machine", category: "deferrable" as const, powerW: 1500, window: { startHour: 9, endHour: 15 }, runHours: 1 },
        { id: "pump", name: "Water pump", category: "deferrable" as const, powerW: 750, runHours: 2 },
      ],
      days: 2,
      startAt: START_AT,
      forecast: [],
    };

    for (const controller of CONTROLLER_KINDS) {
      it.effect(`should keep soc and served load within bounds under ${controller}`, () =>
        Effect.gen(function* () {
          const simulation = yield* makeSimulation({ ...mixedHousehold, controller, eventLogger: eventLoggerMock });
          const output = yield* simulation.run();
          const maximum = catalogMaximumByCategory(simulation.appliances);

          expect(output.records).toHaveLength(192);
          expect(output.totalSteps).toBe(192);
          expect(Object.isFrozen(output.records)).toBe(true);

          output.records.forEach((record, i) => {
            expect(record.stepIndex).toBe(i);
            expect(record.soc).toBeGreaterThanOrEqual(0.1);
            expect(record.soc).toBeLessThanOrEqual(0.95);
            expect(record.pvKw).toBeGreaterThanOrEqual(0);
            expect(Object.isFrozen(record)).toBe(true);

            for (const category of LOAD_CATEGORIES) {
              expect(record.served[category]).toBeLessThanOrEqual(record.requested[category] + 1e-9);
              expect(record.requested[category]).toBeLessThanOrEqual(maximum[category] + 1e-9);
            }

            const previous = output.records[i - 1];
            if (previous !== undefined) {
              expect(Date.parse(record.timestamp)).toBeGreaterThan(Date.parse(previous.timestamp));
            }
          });
        })
      );
    }

    it.effect("should produce identical output when run twice", () =>
      Effect.gen(function* () {
        const simulation = yield* makeSimulation({ ...mixedHousehold, controller: "forecast_heuristic", eventLogger: eventLoggerMock });

        const first = yield* simulation.run();
        const second = yield* simulation.run();

        expect(second).toEqual(first);
      })
    );
  });

  describe("forecast resolution", () => {
    it.effect("should complete with fallback data when the forecast is empty", () =>
      Effect.gen(function* () {
        const simulation = yield* makeSimulation({
          config: scenarioSystem,
          appliances: criticalOnly(300),
          controller: "naive",
          days: 1,
          startAt: START_AT,
          forecast: [],
          eventLogger: eventLoggerMock,
        });
        const output = yield* simulation.run();

        expect(output.status).toBe("completed_with_fallback");
        expect(output.forecastProvenance).toBe("fallback");
        expect(output.records[48]?.pvKw).toBeCloseTo(2.55, 10);
        expect(eventLoggerMock.onForecastFallback).toHaveBeenCalledWith("naive");
      })
    );
  });

  describe("events", () => {
    it.effect("should report run progress to the event logger", () =>
      Effect.gen(function* () {
        const simulation = yield* makeSimulation({
          config: { ...scenarioSystem, pvCapacityKw: 1 },
          appliances: criticalOnly(4000),
          controller: "rule_based",
          days: 2,
          startAt: START_AT,
          forecast: flatIrradiance(500, 2),
          eventLogger: eventLoggerMock,
        });
        yield* simulation.run();

        expect(eventLoggerMock.onRunStarted).toHaveBeenCalledWith("rule_based", 192, "forecast");
        expect(eventLoggerMock.onForecastFallback).not.toHaveBeenCalled();
        expect(eventLoggerMock.onBlackout).toHaveBeenNthCalledWith(1, 0, "2030-01-01T00:00:00.000Z", 0.5);
        expect(eventLoggerMock.onDayCompleted).toHaveBeenCalledTimes(2);
        expect(eventLoggerMock.onRunCompleted).toHaveBeenCalledTimes(1);
      })
    );
  });

  describe("time alignment", () => {
    it.effect("should request a windowed load from the window's first hour", () =>
      Effect.gen(function* () {
        const simulation = yield* makeSimulation({
          config: scenarioSystem,
          appliances: [
            { id: "washer", name: "Washing machine", category: "deferrable", powerW: 1500, window: { startHour: 9, endHour: 15 }, runHours: 1 },
          ],
          controller: "rule_based",
          days: 1,
          startAt: START_AT,
          forecast: flatIrradiance(500),
          eventLogger: eventLoggerMock,
        });
        const output = yield* simulation.run();

        const firstRequest = output.records.find((record) => record.requested.deferrable > 0);
        expect(firstRequest?.stepIndex).toBe(36);
        expect(firstRequest?.timestamp).toBe("2030-01-01T09:00:00.000Z");
      })
    );

    it.effect("should hand the controller a forecast window starting at the current step", () =>
      Effect.gen(function* () {
        const decide = vitest.fn((input: ControllerInput): Decision => ({
          timestamp: input.timestamp,
          requested: input.requested,
          served: { critical: 0, flexible: 0, deferrable: 0 },
          servedTaskIds: [],
          deferredTaskIds: [],
          shedTaskIds: [],
          netCommandKw: 0,
          blackout: false,
          riskLevel: "low",
          reasonCodes: [],
        }));
        const hourlyPv = Array.from({ length: 24 }, (_, hour) => hour);

        const loop = new SimulationLoop(
          makeConfig({ timestepMinutes: 60, horizonSteps: 2 }),
          [],
          { kind: "naive", decide },
          1,
          START_AT,
          hourlyPv,
          "forecast",
          eventLoggerMock,
        );
        yield* loop.run();

        expect(decide).toHaveBeenCalledTimes(24);
        expect(decide.mock.calls[0]?.[0].forecast.pvKw).toEqual([0, 1]);
        expect(decide.mock.calls[10]?.[0].forecast.pvKw).toEqual([10, 11]);
        expect(decide.mock.calls[23]?.[0].forecast.pvKw).toEqual([23, 0]);
      })
    );
  });

  describe("makeSimulation", () => {
    it.effect("should fail with InvalidConfig when the run does not start at a UTC midnight", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          makeSimulation({
            config: scenarioSystem,
            appliances: criticalOnly(100),
            controller: "naive",
            days: 1,
            startAt: new Date("2030-01-01T06:00:00.000Z"),
            forecast: flatIrradiance(500),
          })
        );

        expect(error._tag).toBe("InvalidConfig");
        expect(error.message).toBe("startAt must be a UTC midnight, received 2030-01-01T06:00:00.000Z");
      })
    );

    it.effect("should fail with InvalidConfig when socMin exceeds socMax", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          makeSimulation({
            config: { ...scenarioSystem, socMin: 0.9, socMax: 0.5, socInitial: 0.6, reserveSoc: 0.6 },
            appliances: criticalOnly(100),
            controller: "naive",
            days: 1,
            startAt: START_AT,
            forecast: [],
          })
        );

        expect(error._tag).toBe("InvalidConfig");
        expect(error.message).toContain("socMin (0.9) must not exceed socMax (0.5)");
      })
    );

    it.effect("should fail with InvalidConfig for a non-positive day count", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          makeSimulation({
            config: scenarioSystem,
            appliances: criticalOnly(100),
            controller: "naive",
            days: 0,
            startAt: START_AT,
            forecast: [],
          })
        );

        expect(error.message).toBe("days must be a positive integer, received 0");
      })
    );

    it.effect("should fail with InvalidConfig for static priority weights out of range", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          makeSimulation({
            config: scenarioSystem,
            appliances: criticalOnly(100),
            controller: "static_priority",
            staticPriority: {
              thresholds: { flexible: 0.3, deferrable: 0.4 },
              weights: { flexible: 2, deferrable: 0.5 },
            },
            days: 1,
            startAt: START_AT,
            forecast: [],
          })
        );

        expect(error._tag).toBe("InvalidConfig");
        expect(error.message).toBe("Static priority weights must be between 0 and 1");
      })
    );

    it.effect("should reject duplicate appliance ids", () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          makeSimulation({
            config: scenarioSystem,
            appliances: [...criticalOnly(100), ...criticalOnly(200)],
            controller: "naive",
            days: 1,
            startAt: START_AT,
            forecast: [],
          })
        );

        expect(error.message).toContain('duplicate appliance id "essentials"');
      })
    );
  });
});
