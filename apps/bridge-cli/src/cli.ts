import { parseArgs } from "node:util";
import { parseBackend, type Backend } from "@cadlink/cad-clients";
import { parseTransformRequest, type PivotPolicy, type TransformRequest } from "@cadlink/sketch-transform";

export type Command =
  | { kind: "help" }
  | { kind: "monitor"; intervalMs?: number }
  | { kind: "probe" }
  | {
      kind: "transfer";
      from: Backend;
      to: Backend;
      name?: string;
      plane?: string;
      transform: TransformRequest;
    };

export type TransferCommand = Extract<Command, { kind: "transfer" }>;

export const USAGE = `Usage:
  cadlink [monitor] [--interval <ms>]     probe every backend until interrupted
  cadlink probe                           probe once and print the result
  cadlink transfer <from> <to> [options]  copy every sketch of <from> into <to>

Transfer options:
  --dx <n> --dy <n>          translation
  --angle <deg>              counter-clockwise rotation
  --pivot <origin|centroid|x,y>
  --strip                    drop constraints
  --plane <id>               target plane
  --name <name>              name of the created sketch (single sketch only)

Each CAD plugin serves JSON-RPC over HTTP on localhost:9876 (FreeCAD),
9877 (Inventor), 9878 (SolidWorks) or 9879 (Fusion 360). Override with
CADLINK_<SYSTEM>_HOST and CADLINK_<SYSTEM>_PORT, e.g. CADLINK_FUSION_PORT.`;

function optionalNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) throw new Error(`--${flag} expects a number, got "${value}"`);
  return n;
}

function parsePivot(value: string | undefined): PivotPolicy | undefined {
  if (value === undefined || value === "origin" || value === "centroid") return value;
  const [x, y, ...rest] = value.split(",");
  if (x === undefined || y === undefined || rest.length > 0) {
    throw new Error(`--pivot expects origin, centroid or x,y, got "${value}"`);
  }
  return { x: optionalNumber("pivot", x) ?? 0, y: optionalNumber("pivot", y) ?? 0 };
}

export function parseCommand(argv: string[]): Command {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      help: { type: "boolean", short: "h" },
      interval: { type: "string" },
      dx: { type: "string" },
      dy: { type: "string" },
      angle: { type: "string" },
      pivot: { type: "string" },
      strip: { type: "boolean" },
      plane: { type: "string" },
      name: { type: "string" },
    },
  });

  if (values.help) return { kind: "help" };

  const [verb = "monitor", ...args] = positionals;
  switch (verb) {
    case "monitor": {
      const intervalMs = optionalNumber("interval", values.interval);
      if (intervalMs !== undefined && (!Number.isInteger(intervalMs) || intervalMs <= 0)) {
        throw new Error(`--interval expects a positive whole number of milliseconds, got "${values.interval}"`);
      }
      return intervalMs === undefined ? { kind: "monitor" } : { kind: "monitor", intervalMs };
    }
    case "probe":
      return { kind: "probe" };
    case "transfer": {
      const [from, to] = args;
      if (from === undefined || to === undefined) throw new Error("transfer needs a source and a target system");
      const command: TransferCommand = {
        kind: "transfer",
        from: parseBackend(from),
        to: parseBackend(to),
        transform: parseTransformRequest({
          dx: optionalNumber("dx", values.dx),
          dy: optionalNumber("dy", values.dy),
          angleDeg: optionalNumber("angle", values.angle),
          pivot: parsePivot(values.pivot),
          stripConstraints: values.strip,
        }),
      };
      if (values.name !== undefined) command.name = values.name;
      if (values.plane !== undefined) command.plane = values.plane;
      return command;
    }
    default:
      throw new Error(`Unknown command "${verb}"`);
  }
}
