import { Effect } from "effect";
import {
  dischargeablePowerKw,
  updateBattery,
  type BatteryState,
} from "../battery/battery-state-model.js";
import { makeController, shedForShortfall } from "../controller/index.js";
import type { StaticPriorityOptions } from "../controller/static-priority.controller.js";
import type { ControllerKind, ControllerPolicy } from "../controller/types.js";
import { InvalidConfigError } from "../errors/invalid-config.error.js";
import { EventLogger } from "../event-logger/index.js";
import type { SimulationEventLogger } from "../event-logger/types.js";
import { resolveIrradiance, stepTimestamps } from "../forecast/resample.js";
import type { ForecastProvenance } from "../forecast/types.js";
import { KpiAccumulator } from "../kpi/kpi-accumulator.js";
import {
  advanceTasks,
  buildDailyTasks,
  requestedByCategory,
  totalPower,
} from "../load/load-demand-model.js";
import { pvSeries } from "../pv/pv-conversion.js";
import type {
  Appliance,
  ApplianceInput,
  IrradiancePoint,
  KpiSnapshot,
  StepRecord,
  SystemConfig,
  SystemConfigInput,
  TaskInstance,
} from "../schema.js";
import { decodeApplianceCatalog, decodeSystemConfig, stepsPerDayFor } from "../validation.js";

export type SimulationStatus = "completed" | "completed_with_fallback";

export type SimulationOptions = {
  readonly config: SystemConfigInput;
  readonly appliances: readonly ApplianceInput[];
  readonly controller: ControllerKind;
  readonly days: number;
  readonly startAt: Date;
  readonly forecast: readonly IrradiancePoint[];
  readonly staticPriority?: StaticPriorityOptions;
  readonly eventLogger?: SimulationEventLogger;
};

export type SimulationOutput = {
  readonly status: SimulationStatus;
  readonly controller: ControllerKind;
  readonly forecastProvenance: ForecastProvenance;
  readonly startAt: string;
  readonly stepsPerDay: number;
  readonly totalSteps: number;
  readonly records: readonly StepRecord[];
  readonly finalKpis: KpiSnapshot;
  readonly endSoc: number;
};

// Everything a single run mutates. Created fresh by every run() call.
type RunContext = {
  battery: BatteryState;
  tasks: TaskInstance[];
  readonly kpis: KpiAccumulator;
  readonly records: StepRecord[];
};

type StepOutcome = {
  readonly record: StepRecord;
  readonly criticalShortfallKw: number;
};

export class SimulationLoop {
  private readonly dtHours: number;
  private readonly timestamps: readonly string[];
  public readonly stepsPerDay: number;
  public readonly totalSteps: number;

  public constructor(
    public readonly config: SystemConfig,
    public readonly appliances: readonly Appliance[],
    private readonly controller: ControllerPolicy,
    private readonly days: number,
    private readonly startAt: Date,
    private readonly pvKw: readonly number[],
    private readonly provenance: ForecastProvenance,
    private readonly eventLogger: SimulationEventLogger = new EventLogger(),
  ) {
    this.dtHours = config.timestepMinutes / 60;
    this.stepsPerDay = stepsPerDayFor(config.timestepMinutes);
    this.totalSteps = this.days * this.stepsPerDay;
    this.timestamps = stepTimestamps(startAt, this.totalSteps, config.timestepMinutes).map((date) => date.toISOString());
  }

  public run(): Effect.Effect<SimulationOutput> {
    return Effect.gen(this, function* () {
      const context: RunContext = {
        battery: { soc: this.config.socInitial },
        tasks: [],
        kpis: new KpiAccumulator(this.config.timestepMinutes),
        records: [],
      };

      yield* this.eventLogger.onRunStarted(this.controller.kind, this.totalSteps, this.provenance);
      if (this.provenance === "fallback") {
        yield* this.eventLogger.onForecastFallback(this.controller.kind);
      }

      for (let stepIndex = 0; stepIndex < this.totalSteps; stepIndex++) {
        const outcome = yield* Effect.sync(() => this.step(context, stepIndex));

        if (outcome.record.blackout) {
          yield* this.eventLogger.onBlackout(stepIndex, outcome.record.timestamp, outcome.criticalShortfallKw);
        }
        if ((stepIndex + 1) % this.stepsPerDay === 0) {
          yield* this.eventLogger.onDayCompleted(outcome.record.day, outcome.record.kpis);
        }
      }

      const finalKpis = context.kpis.snapshot();
      yield* this.eventLogger.onRunCompleted(this.controller.kind, finalKpis, context.battery.soc);

      return {
        status: this.provenance === "fallback" ? "completed_with_fallback" : "completed",
        controller: this.controller.kind,
        forecastProvenance: this.provenance,
        startAt: this.startAt.toISOString(),
        stepsPerDay: this.stepsPerDay,
        totalSteps: this.totalSteps,
        records: Object.freeze(context.records),
        finalKpis,
        endSoc: context.battery.soc,
      } satisfies SimulationOutput;
    }).pipe(Effect.withSpan("SimulationLoop.run", { attributes: { controller: this.controller.kind } }));
  }

  private forecastWindow(stepIndex: number): number[] {
    return Array.from(
      { length: this.config.horizonSteps },
      (_, offset) => this.pvKw[stepIndex + offset] ?? 0,
    );
  }

  private step(context: RunContext, stepIndex: number): StepOutcome {
    const day = Math.floor(stepIndex / this.stepsPerDay);
    const dayStep = stepIndex % this.stepsPerDay;
    const timestamp = this.timestamps[stepIndex] ?? this.startAt.toISOString();

    if (dayStep === 0) {
      context.tasks = buildDailyTasks(this.appliances, day, this.config.timestepMinutes);
    }

    const pvKw = this.pvKw[stepIndex] ?? 0;
    const requested = requestedByCategory(context.tasks, dayStep);
    const state = context.battery;

    let decision = this.controller.decide({
      timestamp,
      step: dayStep,
      state,
      requested,
      tasks: context.tasks,
      supply: {
        pvKw,
        batteryKw: dischargeablePowerKw(state, this.config.socMin, this.dtHours, this.config),
        batteryAboveReserveKw: dischargeablePowerKw(state, this.config.reserveSoc, this.dtHours, this.config),
      },
      forecast: {
        pvKw: this.forecastWindow(stepIndex),
        pvCapacityKw: this.config.pvCapacityKw,
      },
    });

    let update = updateBattery(state, decision.netCommandKw, this.dtHours, this.config);

    // discharge the battery could not deliver becomes shed load
    if (update.unmetKw < 0) {
      decision = shedForShortfall(decision, -update.unmetKw, context.tasks);
      update = updateBattery(state, decision.netCommandKw, this.dtHours, this.config);
    }

    const chargeKw = Math.max(0, update.realizedKw);
    const dischargeKw = Math.max(0, -update.realizedKw);
    const curtailedKw = Math.max(0, pvKw - totalPower(decision.served) - chargeKw);

    context.battery = update.state;
    context.tasks = advanceTasks(context.tasks, decision.servedTaskIds);
    context.kpis.update({
      dtHours: this.dtHours,
      requested,
      served: decision.served,
      pvKw,
      curtailedKw,
      chargeKw,
      dischargeKw,
    });

    const record: StepRecord = Object.freeze({
      stepIndex,
      day,
      timestamp,
      pvKw,
      soc: update.state.soc,
      requested,
      served: decision.served,
      servedTaskIds: decision.servedTaskIds,
      deferredTaskIds: decision.deferredTaskIds,
      shedTaskIds: decision.shedTaskIds,
      chargeKw,
      dischargeKw,
      curtailedKw,
      blackout: decision.blackout,
      riskLevel: decision.riskLevel,
      reasonCodes: decision.reasonCodes,
      kpis: context.kpis.snapshot(),
    });
    context.records.push(record);

    return { record, criticalShortfallKw: Math.max(0, requested.critical - decision.served.critical) };
  }
}

/**
 * Validates the household, resolves the forecast onto the step grid and
 * returns a loop ready to run. Fails with InvalidConfig before any step.
 */
export const makeSimulation = (options: SimulationOptions): Effect.Effect<SimulationLoop, InvalidConfigError> =>
  Effect.gen(function* () {
    const config = yield* decodeSystemConfig(options.config);
    const appliances = yield* decodeApplianceCatalog(options.appliances);

    if (!Number.isInteger(options.days) || options.days < 1) {
      return yield* new InvalidConfigError({ message: `days must be a positive integer, received ${options.days}` });
    }
    if (Number.isNaN(options.startAt.getTime())) {
      return yield* new InvalidConfigError({ message: "startAt is not a valid date" });
    }
    // appliance windows and window labels count from the start of a UTC day
    if (options.startAt.getTime() % 86_400_000 !== 0) {
      return yield* new InvalidConfigError({
        message: `startAt must be a UTC midnight, received ${options.startAt.toISOString()}`,
      });
    }

    const controller = yield* Effect.try({
      try: () => makeController(options.controller, config, options.staticPriority),
      catch: (error) =>
        new InvalidConfigError({ message: error instanceof Error ? error.message : String(error) }),
    });

    const totalSteps = options.days * stepsPerDayFor(config.timestepMinutes);
    const irradiance = resolveIrradiance(options.forecast, {
      totalSteps,
      startAt: options.startAt,
      timestepMinutes: config.timestepMinutes,
    });

    return new SimulationLoop(
      config,
      appliances,
      controller,
      options.days,
      options.startAt,
      pvSeries(irradiance.ghiWm2, config),
      irradiance.provenance,
      options.eventLogger,
    );
  });
