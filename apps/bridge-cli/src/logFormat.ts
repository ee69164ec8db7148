import { z } from "zod";
import { Topics, type LogEventPayload } from "@cadlink/event-bus";
import { getBackendName, isBackend } from "@cadlink/cad-clients";

const connectivitySchema = z.object({ backend: z.string(), connected: z.boolean() });
const statusSchema = z.object({ backend: z.string(), status: z.record(z.string(), z.unknown()) });
const failureSchema = z.object({
  backend: z.string(),
  kind: z.string(),
  operation: z.string(),
  message: z.string()
});
const collectedSchema = z.object({
  backend: z.string(),
  outcome: z.string(),
  requested: z.number(),
  collected: z.number(),
  failed: z.array(z.string())
});
const deliveredSchema = z.object({
  backend: z.string(),
  sketch: z.string(),
  createdName: z.string().nullable(),
  transformed: z.boolean()
});

function backendName(backend: string): string {
  return isBackend(backend) ? getBackendName(backend) : backend;
}

function describe(event: LogEventPayload): string | null {
  switch (event.topic) {
    case Topics.CAD_CONNECTIVITY_CHANGED: {
      const p = connectivitySchema.safeParse(event.payload);
      if (!p.success) return null;
      return `${backendName(p.data.backend)} ${p.data.connected ? "connected" : "disconnected"}`;
    }
    case Topics.CAD_STATUS_UPDATED: {
      const p = statusSchema.safeParse(event.payload);
      if (!p.success) return null;
      return `${backendName(p.data.backend)} status ${JSON.stringify(p.data.status)}`;
    }
    case Topics.CAD_OPERATION_FAILED: {
      const p = failureSchema.safeParse(event.payload);
      if (!p.success) return null;
      return `${backendName(p.data.backend)} ${p.data.operation} failed (${p.data.kind}): ${p.data.message}`;
    }
    case Topics.TRANSFER_COLLECTED: {
      const p = collectedSchema.safeParse(event.payload);
      if (!p.success) return null;
      const { outcome, requested, collected, failed } = p.data;
      const name = backendName(p.data.backend);
      if (outcome !== "collected") return `${name} collect: ${outcome}`;
      const failures = failed.length > 0 ? `, failed: ${failed.join(", ")}` : "";
      return `${name} collect: ${collected}/${requested} sketches${failures}`;
    }
    case Topics.TRANSFER_DELIVERED: {
      const p = deliveredSchema.safeParse(event.payload);
      if (!p.success) return null;
      const how = p.data.transformed ? " (transformed)" : "";
      const target = p.data.createdName === null ? "failed" : `created ${p.data.createdName}`;
      return `${backendName(p.data.backend)} deliver ${p.data.sketch}${how}: ${target}`;
    }
    default:
      return null;
  }
}

/** One console line per bus event; unknown topics print their raw payload. */
export function formatLogLine(event: LogEventPayload, at: Date = new Date()): string {
  const text = describe(event) ?? JSON.stringify(event.payload);
  return `${at.toISOString()} [${event.topic}] ${text}`;
}
