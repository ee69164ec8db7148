import { z } from "zod";
import type { EventBus, Unsubscribe } from "@cadlink/event-bus";
import { sketchDocumentDataSchema, type SketchDocumentData } from "@cadlink/sketch-model";
import type { Backend, BackendEndpoint } from "../backends.js";
import type { CadStatus, PlaneInfo, SketchInfo } from "../types.js";
import { busServiceName } from "./BusRpcTransport.js";

type MaybePromise<T> = T | Promise<T>;

/** What a CAD-side bridge implements to answer {@link BusRpcTransport} calls. */
export interface CadServiceHandlers {
  ping(): MaybePromise<boolean>;
  getStatus(): MaybePromise<CadStatus>;
  listSketches(): MaybePromise<SketchInfo[]>;
  listPlanes(): MaybePromise<PlaneInfo[]>;
  exportSketch(name: string): MaybePromise<SketchDocumentData>;
  importSketch(data: SketchDocumentData, name: string | null, plane: string | null): MaybePromise<string>;
  openSketch(name: string): MaybePromise<boolean>;
}

const nameArg = z.string();
const optionalNameArg = z.string().nullable().default(null);

export function serveCadService(
  bus: EventBus,
  backend: Backend,
  endpoint: BackendEndpoint,
  handlers: CadServiceHandlers,
): Unsubscribe {
  return bus.rpcService(busServiceName(backend, endpoint), {
    ping: () => handlers.ping(),
    get_status: () => handlers.getStatus(),
    list_sketches: () => handlers.listSketches(),
    list_planes: () => handlers.listPlanes(),
    export_sketch: (name) => handlers.exportSketch(nameArg.parse(name)),
    import_sketch: (data, name, plane) =>
      handlers.importSketch(
        sketchDocumentDataSchema.parse(data),
        optionalNameArg.parse(name),
        optionalNameArg.parse(plane),
      ),
    open_sketch: (name) => handlers.openSketch(nameArg.parse(name)),
  });
}
