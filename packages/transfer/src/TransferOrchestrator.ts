import { Topics, type EventBus } from "@cadlink/event-bus";
import type { Backend, PlaneInfo } from "@cadlink/cad-clients";
import type { ConnectionManager } from "@cadlink/connection-manager";
import type { SketchDocument } from "@cadlink/sketch-model";
import { isIdentityTransform, transformSketch, type TransformRequest } from "@cadlink/sketch-transform";
import type { SketchSelector } from "./SketchSelector.js";

/** The part of {@link ConnectionManager} a transfer needs. */
export type SketchGateway = Pick<ConnectionManager, "listSketches" | "listPlanes" | "exportSketch" | "importSketch">;

export type CollectResult =
  | { status: "no-sketches" }
  | { status: "cancelled" }
  | { status: "nothing-selected" }
  | { status: "collected"; collected: number; documents: SketchDocument[]; failed: string[] };

export type DeliverOptions = {
  name?: string;
  plane?: string;
  transform?: Partial<TransformRequest>;
};

export const DEFAULT_PLANES: readonly PlaneInfo[] = Object.freeze([
  { id: "XY", name: "XY Plane", type: "origin" },
  { id: "XZ", name: "XZ Plane", type: "origin" },
  { id: "YZ", name: "YZ Plane", type: "origin" },
]);

export class TransferOrchestrator {
  constructor(
    private readonly bus: EventBus,
    private readonly gateway: SketchGateway,
    private readonly selector: SketchSelector,
  ) {}

  /**
   * Exports sketches from `backend`. A single sketch is taken without asking the
   * selector; each export is tried on its own and failures are listed by name.
   */
  async collect(backend: Backend): Promise<CollectResult> {
    const sketches = await this.gateway.listSketches(backend);
    const [only] = sketches;
    if (!only) return this.reportCollect(backend, { status: "no-sketches" }, 0);

    let names: string[];
    if (sketches.length === 1) {
      names = [only.name];
    } else {
      const chosen = await this.selector.select(backend, sketches);
      if (chosen === null) return this.reportCollect(backend, { status: "cancelled" }, 0);
      if (chosen.length === 0) return this.reportCollect(backend, { status: "nothing-selected" }, 0);
      names = chosen;
    }

    const documents: SketchDocument[] = [];
    const failed: string[] = [];
    for (const name of names) {
      const doc = await this.gateway.exportSketch(backend, name);
      if (doc) {
        documents.push(doc);
      } else {
        failed.push(name);
      }
    }

    return this.reportCollect(
      backend,
      { status: "collected", collected: documents.length, documents, failed },
      names.length,
    );
  }

  /** Imports `sketch` into `backend`, transformed first unless the request changes nothing. */
  async deliver(backend: Backend, sketch: SketchDocument, options: DeliverOptions = {}): Promise<string | null> {
    const request = options.transform ?? {};
    const transformed = !isIdentityTransform(request);
    const doc = transformed ? transformSketch(sketch, request) : sketch;

    const createdName = await this.gateway.importSketch(backend, doc, options.name, options.plane);
    this.bus.publish(Topics.TRANSFER_DELIVERED, { backend, sketch: sketch.name, createdName, transformed });
    return createdName;
  }

  /** Planes offered by `backend`, or XY/XZ/YZ when it lists none. */
  async listPlanes(backend: Backend): Promise<PlaneInfo[]> {
    const planes = await this.gateway.listPlanes(backend);
    if (planes.length > 0) return planes;
    return DEFAULT_PLANES.map((plane) => ({ ...plane }));
  }

  private reportCollect(backend: Backend, result: CollectResult, requested: number): CollectResult {
    this.bus.publish(Topics.TRANSFER_COLLECTED, {
      backend,
      outcome: result.status,
      requested,
      collected: result.status === "collected" ? result.collected : 0,
      failed: result.status === "collected" ? [...result.failed] : [],
    });
    return result;
  }
}
