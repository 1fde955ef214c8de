import type { SimulationEventLogger } from "./types.js";
import type { ControllerKind } from "../controller/types.js";
import type { ForecastProvenance } from "../forecast/types.js";
import type { KpiSnapshot } from "../schema.js";
import { Effect } from "effect";

const percent = (fraction: number) => `${(fraction * 100).toFixed(1)}%`;

export class EventLogger implements SimulationEventLogger {

  public onRunStarted(controller: ControllerKind, totalSteps: number, provenance: ForecastProvenance) {
    return Effect.log(`Starting ${controller} run over ${totalSteps} steps (${provenance} irradiance)`);
  }

  public onForecastFallback(controller: ControllerKind) {
    return Effect.logWarning(`No usable forecast for ${controller} run, using placeholder irradiance profile`);
  }

  public onBlackout(stepIndex: number, timestamp: string, shortfallKw: number) {
    return Effect.logDebug(`Blackout at step ${stepIndex} (${timestamp}): ${shortfallKw.toFixed(3)} kW critical unserved`);
  }

  public onDayCompleted(day: number, kpis: KpiSnapshot) {
    return Effect.log(`Day ${day} completed`).pipe(
      Effect.annotateLogs({
        clsr: percent(kpis.clsr),
        blackoutMinutes: kpis.blackoutMinutes,
        sar: percent(kpis.sar),
      }),
    );
  }

  public onRunCompleted(controller: ControllerKind, kpis: KpiSnapshot, endSoc: number) {
    return Effect.log(
      `Finished ${controller} run: CLSR ${percent(kpis.clsr)}, ${kpis.blackoutMinutes} blackout minutes, end SOC ${percent(endSoc)}`,
    );
  }
}
