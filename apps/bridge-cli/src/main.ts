#!/usr/bin/env -S node --import tsx
import { Topics } from "@cadlink/event-bus";
import { ConnectionManager, connectionManagerConfigFromEnv } from "@cadlink/connection-manager";
import { TransferOrchestrator, selectAllSketches } from "@cadlink/transfer";
import { bus } from "./bus.js";
import { USAGE, parseCommand, type Command } from "./cli.js";
import { formatLogLine } from "./logFormat.js";
import { runTransfer } from "./transfer.js";

bus.subscribe(Topics.LOG_EVENT, (event) => {
  console.log(formatLogLine(event));
});

async function run(command: Command): Promise<number> {
  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  const manager = new ConnectionManager({ bus, config: connectionManagerConfigFromEnv() });

  switch (command.kind) {
    case "monitor": {
      manager.start(command.intervalMs);
      process.once("SIGINT", () => {
        manager.stop();
      });
      return 0;
    }
    case "probe": {
      await manager.runProbeCycle();
      for (const backend of manager.getBackends()) {
        const state = manager.isConnected(backend) ? "connected" : "offline";
        console.log(`${manager.getBackendName(backend)}: ${state}`);
      }
      return 0;
    }
    case "transfer": {
      const orchestrator = new TransferOrchestrator(bus, manager, selectAllSketches);
      return runTransfer(manager, orchestrator, command);
    }
  }
}

try {
  process.exitCode = await run(parseCommand(process.argv.slice(2)));
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
