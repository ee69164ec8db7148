import type { ConnectionManager } from "@cadlink/connection-manager";
import type { TransferOrchestrator } from "@cadlink/transfer";
import type { TransferCommand } from "./cli.js";

export type TransferSession = Pick<ConnectionManager, "connect" | "disconnect" | "getBackendName">;
export type TransferSteps = Pick<TransferOrchestrator, "collect" | "deliver">;

/**
 * Runs `cadlink transfer` and resolves the exit code. Both backends are
 * disconnected however the run ends; every reason for a non-zero code is
 * passed to `report`.
 */
export async function runTransfer(
  manager: TransferSession,
  orchestrator: TransferSteps,
  command: TransferCommand,
  report: (line: string) => void = console.error,
): Promise<number> {
  const { from, to } = command;
  try {
    for (const backend of [from, to]) {
      if (!(await manager.connect(backend))) {
        report(`${manager.getBackendName(backend)} is not reachable`);
        return 1;
      }
    }

    const result = await orchestrator.collect(from);
    if (result.status !== "collected") {
      report(`Nothing to transfer from ${manager.getBackendName(from)}: ${result.status}`);
      return 1;
    }

    const selected = result.collected + result.failed.length;
    if (command.name !== undefined && selected > 1) {
      report(`--name needs a single sketch, ${selected} were selected`);
      return 1;
    }

    let failures = 0;
    for (const name of result.failed) {
      report(`Could not export ${name}`);
      failures += 1;
    }
    for (const doc of result.documents) {
      const created = await orchestrator.deliver(to, doc, {
        name: command.name,
        plane: command.plane,
        transform: command.transform,
      });
      if (created === null) {
        report(`Could not import ${doc.name}`);
        failures += 1;
      }
    }
    return failures === 0 ? 0 : 1;
  } finally {
    await manager.disconnect(from);
    await manager.disconnect(to);
  }
}
