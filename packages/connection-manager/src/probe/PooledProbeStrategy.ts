import { ProbeMode } from "../config.js";
import { throwIfAnyFailed, type ProbeStrategy, type ProbeTask } from "./ProbeStrategy.js";

export const DEFAULT_POOL_SIZE = 4;

/** Runs up to `poolSize` tasks at once; each task reconciles as soon as it settles. */
export class PooledProbeStrategy implements ProbeStrategy {
  readonly mode = ProbeMode.POOLED;
  private generation = 0;

  constructor(readonly poolSize: number = DEFAULT_POOL_SIZE) {
    if (!Number.isInteger(poolSize) || poolSize < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${poolSize}`);
    }
  }

  async run(tasks: readonly ProbeTask[]): Promise<void> {
    const generation = this.generation;
    const queue = [...tasks];
    const errors: unknown[] = [];

    const worker = async () => {
      while (generation === this.generation) {
        const task = queue.shift();
        if (!task) return;
        try {
          await task();
        } catch (error) {
          errors.push(error);
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.poolSize, queue.length) }, worker);
    await Promise.all(workers);
    throwIfAnyFailed(errors);
  }

  shutdown(): void {
    this.generation += 1;
  }
}
