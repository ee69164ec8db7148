import { ProbeMode } from "../config.js";
import { throwIfAnyFailed, type ProbeStrategy, type ProbeTask } from "./ProbeStrategy.js";

/** One task at a time, so a cycle costs the sum of the backends' latencies. */
export class InlineProbeStrategy implements ProbeStrategy {
  readonly mode = ProbeMode.INLINE;
  private generation = 0;

  async run(tasks: readonly ProbeTask[]): Promise<void> {
    const generation = this.generation;
    const errors: unknown[] = [];
    for (const task of tasks) {
      if (generation !== this.generation) break;
      try {
        await task();
      } catch (error) {
        errors.push(error);
      }
    }
    throwIfAnyFailed(errors);
  }

  shutdown(): void {
    this.generation += 1;
  }
}
