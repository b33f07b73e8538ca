/**
 * @file lifecycle.ts
 * @description State machine shared by every tracked unit of work
 */

import { InvalidStateError } from "../errors/workflowError";
import { TrackedUnit, UnitStatus } from "../interfaces/workflow";

const TRANSITIONS: Record<UnitStatus, UnitStatus[]> = {
  // pending -> failed only happens when a queued generation task is cancelled
  [UnitStatus.PENDING]: [UnitStatus.RUNNING, UnitStatus.FAILED],
  [UnitStatus.RUNNING]: [UnitStatus.COMPLETED, UnitStatus.FAILED],
  [UnitStatus.COMPLETED]: [],
  [UnitStatus.FAILED]: [],
};

export function isTerminal(status: UnitStatus): boolean {
  return status === UnitStatus.COMPLETED || status === UnitStatus.FAILED;
}

export function canTransition(from: UnitStatus, to: UnitStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * @function transition
 * @description Move a unit to a new status, stamping startedAt / completedAt
 * @throws {InvalidStateError} When the transition is not allowed
 */
export function transition<T>(
  unit: TrackedUnit<T>,
  to: UnitStatus,
  at: Date = new Date()
): void {
  if (!canTransition(unit.status, to)) {
    throw new InvalidStateError(
      `Cannot move ${unit.id} from ${unit.status} to ${to}`
    );
  }
  unit.status = to;
  if (to === UnitStatus.RUNNING) {
    unit.startedAt = at;
  }
  if (isTerminal(to)) {
    unit.completedAt = at;
  }
}

/**
 * @function advanceProgress
 * @description Raise progress to value; lower values are ignored
 */
export function advanceProgress<T>(unit: TrackedUnit<T>, value: number): number {
  const bounded = Math.min(100, Math.max(0, Math.round(value)));
  unit.progress = Math.max(unit.progress, bounded);
  return unit.progress;
}

export function succeed<T>(unit: TrackedUnit<T>, value: T): void {
  transition(unit, UnitStatus.COMPLETED);
  unit.outcome = { kind: "success", value };
  advanceProgress(unit, 100);
}

export function fail<T>(unit: TrackedUnit<T>, error: string): void {
  transition(unit, UnitStatus.FAILED);
  unit.outcome = { kind: "failure", error };
}

export function resultOf<T>(unit: TrackedUnit<T>): T | undefined {
  return unit.outcome?.kind === "success" ? unit.outcome.value : undefined;
}

export function errorOf<T>(unit: TrackedUnit<T>): string | undefined {
  return unit.outcome?.kind === "failure" ? unit.outcome.error : undefined;
}

/**
 * @function evictTerminal
 * @description Drop the oldest terminal units until the map is back within capacity.
 * Relies on Map insertion order being creation order. Pending and running units are kept,
 * as are units the evictable filter rejects.
 * @returns The evicted ids, oldest first
 */
export function evictTerminal<U extends TrackedUnit<unknown>>(
  units: Map<string, U>,
  capacity: number,
  evictable: (unit: U) => boolean = () => true
): string[] {
  const evicted: string[] = [];
  if (units.size <= capacity) {
    return evicted;
  }
  for (const [id, unit] of units) {
    if (units.size <= capacity) break;
    if (isTerminal(unit.status) && evictable(unit)) {
      units.delete(id);
      evicted.push(id);
    }
  }
  return evicted;
}
