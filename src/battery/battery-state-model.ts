import type { SystemConfig } from "../schema.js";

export type BatteryState = {
  readonly soc: number;
};

export type BatteryParameters = Pick<
  SystemConfig,
  "batteryCapacityKwh" | "socMin" | "socMax" | "chargeEfficiency" | "dischargeEfficiency" | "inverterMaxKw"
>;

export type BatteryUpdate = {
  readonly state: BatteryState;
  readonly realizedKw: number; // signed like the command
  readonly unmetKw: number; // signed like the command, 0 when fully realized
};

const POWER_EPSILON_KW = 1e-9;

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

/**
 * AC power the battery can deliver for one step without its SOC dropping
 * below `floorSoc`, bounded by the inverter.
 */
export const dischargeablePowerKw = (
  state: BatteryState,
  floorSoc: number,
  dtHours: number,
  config: BatteryParameters,
): number => {
  const usableKwh = Math.max(0, state.soc - Math.max(floorSoc, config.socMin)) * config.batteryCapacityKwh;
  return Math.min(config.inverterMaxKw, (usableKwh * config.dischargeEfficiency) / dtHours);
};

/**
 * AC power the battery can absorb for one step before reaching socMax,
 * bounded by the inverter.
 */
export const chargeablePowerKw = (
  state: BatteryState,
  dtHours: number,
  config: BatteryParameters,
): number => {
  const headroomKwh = Math.max(0, config.socMax - state.soc) * config.batteryCapacityKwh;
  return Math.min(config.inverterMaxKw, headroomKwh / (dtHours * config.chargeEfficiency));
};

/**
 * Applies a signed power command (+ charge, - discharge) for one step.
 *
 * Charging stores `P·dt·ηc`, discharging draws `|P|·dt/ηd` from the cells.
 * Whatever part of the command would push SOC outside [socMin, socMax] or
 * exceed the inverter rating is returned as `unmetKw` instead of applied.
 */
export const updateBattery = (
  state: BatteryState,
  commandKw: number,
  dtHours: number,
  config: BatteryParameters,
): BatteryUpdate => {
  let realizedKw: number;
  let soc: number;

  if (commandKw >= 0) {
    realizedKw = Math.min(commandKw, chargeablePowerKw(state, dtHours, config));
    soc = state.soc + (realizedKw * dtHours * config.chargeEfficiency) / config.batteryCapacityKwh;
  } else {
    realizedKw = -Math.min(-commandKw, dischargeablePowerKw(state, config.socMin, dtHours, config));
    soc = state.soc + (realizedKw * dtHours) / config.dischargeEfficiency / config.batteryCapacityKwh;
  }

  const unmetKw = commandKw - realizedKw;

  return {
    state: { soc: clamp(soc, config.socMin, config.socMax) },
    realizedKw,
    unmetKw: Math.abs(unmetKw) < POWER_EPSILON_KW ? 0 : unmetKw,
  };
};
