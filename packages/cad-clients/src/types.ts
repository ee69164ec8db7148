import { z } from "zod";
import type { CadStatus } from "@cadlink/event-bus";
import type { SketchDocument } from "@cadlink/sketch-model";
import type { Backend } from "./backends.js";

export type { CadStatus };

export const cadStatusSchema = z.record(z.string(), z.unknown());

export const sketchInfoSchema = z.object({
  name: z.string(),
  label: z.string(),
  geometryCount: z.number().int().nonnegative(),
  constraintCount: z.number().int().nonnegative(),
});

export const planeInfoSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
});

export type SketchInfo = z.infer<typeof sketchInfoSchema>;
export type PlaneInfo = z.infer<typeof planeInfoSchema>;

/**
 * One remote CAD application. Every method but {@link isConnected} goes over the
 * wire and may reject.
 */
export interface ICadClient {
  readonly backend: Backend;

  connect(timeoutMs?: number): Promise<boolean>;
  disconnect(): Promise<void>;
  /** Local view of the session; makes no remote call. */
  isConnected(): boolean;

  getStatus(timeoutMs?: number): Promise<CadStatus>;
  listSketches(): Promise<SketchInfo[]>;
  listPlanes(): Promise<PlaneInfo[]>;

  exportSketch(name: string): Promise<SketchDocument>;
  /** Resolves to the name the sketch was created under. */
  importSketch(doc: SketchDocument, name?: string, plane?: string): Promise<string>;
  openSketch(name: string): Promise<boolean>;
}

export type ClientFactory = (backend: Backend) => ICadClient;
