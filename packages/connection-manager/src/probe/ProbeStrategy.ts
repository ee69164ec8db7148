import type { ProbeMode } from "../config.js";

/** One backend's probe plus reconciliation. */
export type ProbeTask = () => Promise<void>;

export interface ProbeStrategy {
  readonly mode: ProbeMode;
  /**
   * Resolves once every started task has settled. A rejected task does not
   * stop the others; the rejections are raised together afterwards as an
   * `AggregateError`.
   */
  run(tasks: readonly ProbeTask[]): Promise<void>;
  /**
   * Stops starting queued tasks. Tasks already running are left to settle on
   * their own; the strategy can run again afterwards.
   */
  shutdown(): void;
}

export function throwIfAnyFailed(errors: readonly unknown[]): void {
  if (errors.length > 0) {
    throw new AggregateError(errors, `${errors.length} of the probe tasks failed`);
  }
}
