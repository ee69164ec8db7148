import { Topics, type CadFailureKind, type EventBus } from "@cadlink/event-bus";
import type { SketchDocument } from "@cadlink/sketch-model";
import {
  BACKENDS,
  createCadClient,
  createHttpTransportFactory,
  getBackendName,
  resolveEndpoint,
  type Backend,
  type CadStatus,
  type ClientFactory,
  type ICadClient,
  type PlaneInfo,
  type SketchInfo,
  type TransportFactory,
} from "@cadlink/cad-clients";
import { ConnectionTable } from "./ConnectionTable.js";
import {
  parseConnectionManagerConfig,
  type ConnectionManagerConfig,
  type ConnectionManagerConfigInput,
} from "./config.js";
import { createProbeStrategy } from "./probe/createProbeStrategy.js";
import type { ProbeStrategy, ProbeTask } from "./probe/ProbeStrategy.js";

export type ConnectionManagerOptions = {
  bus: EventBus;
  config?: ConnectionManagerConfigInput;
  /** Defaults to the RPC adapters over `transport`. */
  clientFactory?: ClientFactory;
  /** Used by the default adapters. JSON-RPC over HTTP unless set. */
  transport?: TransportFactory;
  /** Defaults to the strategy named by `config.probeMode`. */
  probeStrategy?: ProbeStrategy;
};

type Observation = {
  connected: boolean;
  status: CadStatus;
  error: unknown;
};

const DISCONNECTED: Observation = { connected: false, status: {}, error: null };

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

function hasStatus(status: CadStatus): boolean {
  return Object.keys(status).length > 0;
}

/**
 * Keeps one session per CAD backend, probes them on a timer and publishes
 * `cad:*` events. Adapter errors never escape: calls resolve to empty results
 * and the failure is published on `cad:operation-failed`.
 */
export class ConnectionManager {
  readonly config: ConnectionManagerConfig;

  private readonly bus: EventBus;
  private readonly clientFactory: ClientFactory;
  private readonly strategy: ProbeStrategy;
  private readonly table = new ConnectionTable(BACKENDS);
  private readonly clients = new Map<Backend, ICadClient>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private cycleInFlight = false;

  constructor(options: ConnectionManagerOptions) {
    this.bus = options.bus;
    this.config = parseConnectionManagerConfig(options.config ?? {});
    this.strategy = options.probeStrategy ?? createProbeStrategy(this.config);

    const transport = options.transport ?? createHttpTransportFactory();
    this.clientFactory =
      options.clientFactory ??
      ((backend) => createCadClient(backend, { transport, endpoint: resolveEndpoint(backend) }));
  }

  get probeMode() {
    return this.strategy.mode;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  getBackends(): readonly Backend[] {
    return BACKENDS;
  }

  getBackendName(backend: Backend): string {
    return getBackendName(backend);
  }

  /** Probes immediately, then every `intervalMs`. A second call restarts the timer. */
  start(intervalMs: number = this.config.probeIntervalMs): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = setInterval(() => this.tick(), intervalMs);
    this.tick();
  }

  /** Returns at once; calls already in flight still reconcile when they settle. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.strategy.shutdown();
  }

  isConnected(backend: Backend): boolean {
    return this.table.isConnected(backend);
  }

  getStatus(backend: Backend): CadStatus {
    return this.table.getStatus(backend);
  }

  async connect(backend: Backend, timeoutMs: number = this.config.connectTimeoutMs): Promise<boolean> {
    this.table.bump(backend);

    let observed: Observation;
    try {
      const client = this.client(backend);
      observed = (await client.connect(timeoutMs))
        ? { connected: true, status: await client.getStatus(timeoutMs), error: null }
        : DISCONNECTED;
    } catch (error) {
      observed = { ...DISCONNECTED, error };
      this.reportFailure(backend, "connection", "connect", error);
    }

    this.table.bump(backend);
    this.table.set(backend, observed.connected, observed.status);
    if (observed.connected && hasStatus(observed.status)) {
      this.bus.publish(Topics.CAD_STATUS_UPDATED, { backend, status: { ...observed.status } });
    }
    this.bus.publish(Topics.CAD_CONNECTIVITY_CHANGED, { backend, connected: observed.connected });
    return observed.connected;
  }

  async disconnect(backend: Backend): Promise<void> {
    this.table.bump(backend);

    const client = this.clients.get(backend);
    if (client) {
      try {
        await client.disconnect();
      } catch (error) {
        this.reportFailure(backend, "operation", "disconnect", error);
      }
    }

    this.table.bump(backend);
    this.table.set(backend, false);
    this.bus.publish(Topics.CAD_CONNECTIVITY_CHANGED, { backend, connected: false });
  }

  listSketches(backend: Backend): Promise<SketchInfo[]> {
    return this.whenConnected<SketchInfo[]>(backend, "listSketches", [], (client) => client.listSketches());
  }

  listPlanes(backend: Backend): Promise<PlaneInfo[]> {
    return this.whenConnected<PlaneInfo[]>(backend, "listPlanes", [], (client) => client.listPlanes());
  }

  exportSketch(backend: Backend, name: string): Promise<SketchDocument | null> {
    return this.whenConnected<SketchDocument | null>(backend, "exportSketch", null, (client) =>
      client.exportSketch(name),
    );
  }

  async importSketch(backend: Backend, doc: SketchDocument, name?: string, plane?: string): Promise<string | null> {
    const created = await this.whenConnected<string | null>(backend, "importSketch", null, (client) =>
      client.importSketch(doc, name, plane),
    );
    if (created !== null) await this.openBestEffort(backend, created);
    return created;
  }

  /**
   * One probe of every backend. A no-op while the previous cycle is still
   * reconciling. Rejects only when a `cad:operation-failed` subscriber throws,
   * and then only after every backend has settled.
   */
  async runProbeCycle(): Promise<void> {
    if (this.cycleInFlight) return;
    this.cycleInFlight = true;
    const startedAt = Date.now();

    try {
      const tasks: ProbeTask[] = BACKENDS.map((backend) => async () => {
        const epoch = this.table.epoch(backend);
        const observed = await this.probe(backend);
        try {
          this.reconcile(backend, epoch, observed);
        } catch (error) {
          // A subscriber threw; the record is already written.
          this.reportFailure(backend, "operation", "reconcile", error);
        }
      });
      await this.strategy.run(tasks);
    } finally {
      this.cycleInFlight = false;
    }

    this.bus.publish(Topics.CAD_PROBE_CYCLE_COMPLETED, {
      connected: this.table.connectedBackends(),
      durationMs: Date.now() - startedAt,
    });
  }

  private tick(): void {
    this.runProbeCycle().catch((error: unknown) => {
      process.emitWarning(error instanceof Error ? error : String(error));
    });
  }

  private async probe(backend: Backend): Promise<Observation> {
    try {
      const client = this.client(backend);
      const { probeTimeoutMs, revalidateConnected } = this.config;
      // Revalidation pings even a backend already marked connected.
      const trusted = this.table.isConnected(backend) && !revalidateConnected;
      if (!trusted && !(await client.connect(probeTimeoutMs))) return DISCONNECTED;
      return { connected: true, status: await client.getStatus(probeTimeoutMs), error: null };
    } catch (error) {
      return { ...DISCONNECTED, error };
    }
  }

  private reconcile(backend: Backend, epoch: number, observed: Observation): void {
    // A manual connect/disconnect ran while this probe was in flight.
    if (this.table.epoch(backend) !== epoch) return;

    const wasConnected = this.table.set(backend, observed.connected, observed.status);
    if (observed.connected && hasStatus(observed.status)) {
      this.bus.publish(Topics.CAD_STATUS_UPDATED, { backend, status: { ...observed.status } });
    }
    if (wasConnected === observed.connected) return;

    if (!observed.connected && observed.error !== null) {
      this.reportFailure(backend, "connection", "probe", observed.error);
    }
    this.bus.publish(Topics.CAD_CONNECTIVITY_CHANGED, { backend, connected: observed.connected });
  }

  private async whenConnected<T>(
    backend: Backend,
    operation: string,
    fallback: T,
    call: (client: ICadClient) => Promise<T>,
  ): Promise<T> {
    if (!this.table.isConnected(backend)) return fallback;
    try {
      return await call(this.client(backend));
    } catch (error) {
      this.reportFailure(backend, "operation", operation, error);
      return fallback;
    }
  }

  private async openBestEffort(backend: Backend, name: string): Promise<void> {
    try {
      const opened = await this.client(backend).openSketch(name);
      if (!opened) this.reportFailure(backend, "best-effort", "openSketch", `${name} was not opened`);
    } catch (error) {
      this.reportFailure(backend, "best-effort", "openSketch", error);
    }
  }

  private client(backend: Backend): ICadClient {
    let client = this.clients.get(backend);
    if (!client) {
      client = this.clientFactory(backend);
      this.clients.set(backend, client);
    }
    return client;
  }

  private reportFailure(backend: Backend, kind: CadFailureKind, operation: string, error: unknown): void {
    this.bus.publish(Topics.CAD_OPERATION_FAILED, { backend, kind, operation, message: errorMessage(error) });
  }
}
