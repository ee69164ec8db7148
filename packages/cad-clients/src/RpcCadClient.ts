import { ZodError, z } from "zod";
import { RpcTimeoutError } from "@cadlink/event-bus";
import { SketchDocument } from "@cadlink/sketch-model";
import { getBackendInfo, type Backend, type BackendEndpoint } from "./backends.js";
import { CadProtocolError, CadUnreachableError } from "./errors.js";
import type { IRpcTransport, TransportFactory } from "./transport/RpcTransport.js";
import {
  cadStatusSchema,
  planeInfoSchema,
  sketchInfoSchema,
  type CadStatus,
  type ICadClient,
  type PlaneInfo,
  type SketchInfo,
} from "./types.js";

export type RpcCadClientOptions = {
  transport: TransportFactory;
  endpoint?: Partial<BackendEndpoint>;
  /** Default for every call except `ping`, which uses the connect timeout. `getStatus` takes its own. */
  callTimeoutMs?: number;
};

export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

const pingSchema = z.boolean();
const createdNameSchema = z.string().min(1);

/**
 * Adapter for a CAD application reached over an {@link IRpcTransport}. The
 * transport is opened on the first call, so an adapter nobody uses costs nothing.
 */
export abstract class RpcCadClient implements ICadClient {
  abstract readonly backend: Backend;

  private transport: IRpcTransport | null = null;
  private connected = false;

  constructor(private readonly options: RpcCadClientOptions) {}

  get endpoint(): BackendEndpoint {
    return { ...getBackendInfo(this.backend).endpoint, ...this.options.endpoint };
  }

  get displayName(): string {
    return getBackendInfo(this.backend).displayName;
  }

  async connect(timeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS): Promise<boolean> {
    try {
      this.connected = await this.request("ping", [], (raw) => pingSchema.parse(raw), timeoutMs);
    } catch (error) {
      this.connected = false;
      throw error;
    }
    return this.connected;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.transport?.close();
    this.transport = null;
  }

  isConnected(): boolean {
    return this.connected;
  }

  getStatus(timeoutMs?: number): Promise<CadStatus> {
    return this.request("get_status", [], (raw) => cadStatusSchema.parse(raw), timeoutMs);
  }

  listSketches(): Promise<SketchInfo[]> {
    return this.request("list_sketches", [], (raw) => z.array(sketchInfoSchema).parse(raw));
  }

  listPlanes(): Promise<PlaneInfo[]> {
    return this.request("list_planes", [], (raw) => z.array(planeInfoSchema).parse(raw));
  }

  exportSketch(name: string): Promise<SketchDocument> {
    return this.request("export_sketch", [name], (raw) => SketchDocument.fromData(raw));
  }

  importSketch(doc: SketchDocument, name?: string, plane?: string): Promise<string> {
    return this.request("import_sketch", [doc.toData(), name ?? null, plane ?? null], (raw) =>
      createdNameSchema.parse(raw),
    );
  }

  openSketch(name: string): Promise<boolean> {
    return this.request("open_sketch", [name], (raw) => pingSchema.parse(raw));
  }

  private channel(): IRpcTransport {
    if (!this.transport) {
      this.transport = this.options.transport(this.backend, this.endpoint);
    }
    return this.transport;
  }

  private async request<T>(
    method: string,
    args: unknown[],
    decode: (raw: unknown) => T,
    timeoutMs: number = this.options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS,
  ): Promise<T> {
    let raw: unknown;
    try {
      raw = await this.channel().call(method, args, timeoutMs);
    } catch (error) {
      // An unanswered call means the session is gone; an error reply does not.
      if (error instanceof RpcTimeoutError || error instanceof CadUnreachableError) this.connected = false;
      throw error;
    }

    try {
      return decode(raw);
    } catch (error) {
      if (error instanceof ZodError) throw new CadProtocolError(this.backend, method, error);
      throw error;
    }
  }
}
