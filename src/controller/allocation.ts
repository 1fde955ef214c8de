import { isTaskActive, totalPower } from "../load/load-demand-model.js";
import type { CategoryPower, Decision, LoadCategory, ReasonCode, TaskInstance } from "../schema.js";
import { assessRisk } from "./risk.js";
import type { ControllerInput } from "./types.js";

const POWER_EPSILON_KW = 1e-9;

const NON_CRITICAL: readonly Exclude<LoadCategory, "critical">[] = ["flexible", "deferrable"];

/**
 * Cumulative battery draw a policy permits once each category has been
 * served. Critical gets the whole battery in every policy shipped here, but
 * the field is kept so a policy can hold critical back too.
 */
export type BatteryCaps = Readonly<Record<LoadCategory, number>>;

export type TaskOrder = (tasks: readonly TaskInstance[], step: number) => readonly TaskInstance[];

export const catalogOrder: TaskOrder = (tasks) => tasks;

export type Allocation = {
  readonly served: CategoryPower;
  readonly servedTaskIds: readonly string[];
  readonly deferredTaskIds: readonly string[];
  readonly shedTaskIds: readonly string[];
};

// A task that misses this step can no longer finish inside its window.
const cannotComplete = (task: TaskInstance, step: number) => task.latestEndStep - (step + 1) < task.remainingSteps;

/**
 * Serves critical, then flexible, then deferrable demand.
 *
 * Critical is served at power level and may fall short (blackout). Flexible
 * and deferrable tasks are served whole, in `order`, while they fit the
 * category budget `pv + caps[category] - alreadyServed`.
 */
export const allocate = (
  input: ControllerInput,
  caps: BatteryCaps,
  order: TaskOrder = catalogOrder,
): Allocation => {
  const { pvKw, batteryKw } = input.supply;
  const active = order(input.tasks.filter((task) => isTaskActive(task, input.step)), input.step);
  const capFor = (category: LoadCategory) => Math.max(0, Math.min(caps[category], batteryKw));

  const served: Record<LoadCategory, number> = { critical: 0, flexible: 0, deferrable: 0 };
  const servedTaskIds: string[] = [];
  const deferredTaskIds: string[] = [];
  const shedTaskIds: string[] = [];

  served.critical = Math.min(input.requested.critical, pvKw + capFor("critical"));

  let criticalLeft = served.critical;
  for (const task of active.filter((candidate) => candidate.category === "critical")) {
    if (task.powerKw <= criticalLeft + POWER_EPSILON_KW) {
      servedTaskIds.push(task.id);
      criticalLeft -= task.powerKw;
    } else {
      shedTaskIds.push(task.id);
    }
  }

  let servedSoFar = served.critical;

  for (const category of NON_CRITICAL) {
    let budget = Math.max(0, pvKw + capFor(category) - servedSoFar);

    for (const task of active.filter((candidate) => candidate.category === category)) {
      if (task.powerKw <= budget + POWER_EPSILON_KW) {
        servedTaskIds.push(task.id);
        served[category] += task.powerKw;
        budget -= task.powerKw;
      } else if (cannotComplete(task, input.step)) {
        shedTaskIds.push(task.id);
      } else {
        deferredTaskIds.push(task.id);
      }
    }

    servedSoFar += served[category];
  }

  return { served, servedTaskIds, deferredTaskIds, shedTaskIds };
};

export type DecisionContext = {
  readonly socMin: number;
  readonly outlookLow: boolean;
  readonly policyReasons?: readonly ReasonCode[];
};

export const buildDecision = (
  input: ControllerInput,
  allocation: Allocation,
  context: DecisionContext,
): Decision => {
  const { pvKw, batteryKw } = input.supply;
  const servedKw = totalPower(allocation.served);
  const blackout = allocation.served.critical + POWER_EPSILON_KW < input.requested.critical;

  // something was held back that the battery could still have carried
  const heldBack = [...allocation.deferredTaskIds, ...allocation.shedTaskIds];
  const headroomKw = pvKw + batteryKw - servedKw;
  const reserveProtected = input.tasks.some(
    (task) => task.category !== "critical" && heldBack.includes(task.id) && task.powerKw <= headroomKw + POWER_EPSILON_KW,
  );

  const { riskLevel, reasonCodes } = assessRisk({
    soc: input.state.soc,
    socMin: context.socMin,
    outlookLow: context.outlookLow,
    pvSurplus: pvKw > 0 && pvKw >= totalPower(input.requested),
    tasksHeldBack: heldBack.length > 0,
    blackout,
    policyReasons: [
      ...(reserveProtected ? ["RESERVE_PROTECTED" as const] : []),
      ...(context.policyReasons ?? []),
    ],
  });

  return {
    timestamp: input.timestamp,
    requested: input.requested,
    served: allocation.served,
    servedTaskIds: allocation.servedTaskIds,
    deferredTaskIds: allocation.deferredTaskIds,
    shedTaskIds: allocation.shedTaskIds,
    netCommandKw: pvKw - servedKw,
    blackout,
    riskLevel,
    reasonCodes,
  };
};

/**
 * Drops served load until `shortfallKw` of battery discharge is no longer
 * needed: deferrable tasks first, then flexible, then critical power, which
 * turns the step into a blackout.
 */
export const shedForShortfall = (
  decision: Decision,
  shortfallKw: number,
  tasks: readonly TaskInstance[],
): Decision => {
  const byId = new Map(tasks.map((task) => [task.id, task]));
  const served: Record<LoadCategory, number> = { ...decision.served };
  let servedTaskIds = [...decision.servedTaskIds];
  const shedTaskIds = [...decision.shedTaskIds];
  let remaining = shortfallKw;

  const dropTask = (id: string) => {
    servedTaskIds = servedTaskIds.filter((servedId) => servedId !== id);
    shedTaskIds.push(id);
  };

  for (const category of ["deferrable", "flexible"] as const) {
    for (const id of [...servedTaskIds].reverse()) {
      const task = byId.get(id);
      if (remaining <= POWER_EPSILON_KW || task === undefined || task.category !== category) {
        continue;
      }

      dropTask(id);
      served[category] = Math.max(0, served[category] - task.powerKw);
      remaining -= task.powerKw;
    }
  }

  let blackout = decision.blackout;

  if (remaining > POWER_EPSILON_KW && served.critical > 0) {
    const cut = Math.min(served.critical, remaining);
    served.critical -= cut;
    remaining -= cut;
    blackout = true;

    let criticalLeft = served.critical;
    for (const id of [...servedTaskIds]) {
      const task = byId.get(id);
      if (task === undefined || task.category !== "critical") {
        continue;
      }
      if (task.powerKw <= criticalLeft + POWER_EPSILON_KW) {
        criticalLeft -= task.powerKw;
      } else {
        dropTask(id);
      }
    }
  }

  const removedKw = totalPower(decision.served) - totalPower(served);
  const reasonCodes = [...decision.reasonCodes];
  const addReason = (reason: ReasonCode) => {
    if (!reasonCodes.includes(reason)) {
      reasonCodes.push(reason);
    }
  };

  if (shedTaskIds.length > decision.shedTaskIds.length) {
    addReason("DEFER_TASKS");
  }
  if (blackout) {
    addReason("BLACKOUT");
  }

  return {
    ...decision,
    served,
    servedTaskIds,
    shedTaskIds,
    netCommandKw: decision.netCommandKw + removedKw,
    blackout,
    riskLevel: blackout ? "high" : decision.riskLevel,
    reasonCodes,
  };
};
