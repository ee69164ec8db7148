import type { Backend, CadStatus } from "@cadlink/cad-clients";

type ConnectionRecord = {
  connected: boolean;
  status: CadStatus;
  epoch: number;
};

/**
 * Connection state per backend. Status is kept only while connected; readers
 * get copies. The epoch counts manual writes so a probe can tell whether the
 * record changed under it.
 */
export class ConnectionTable {
  private readonly records = new Map<Backend, ConnectionRecord>();

  constructor(backends: readonly Backend[]) {
    for (const backend of backends) {
      this.records.set(backend, { connected: false, status: {}, epoch: 0 });
    }
  }

  isConnected(backend: Backend): boolean {
    return this.record(backend).connected;
  }

  getStatus(backend: Backend): CadStatus {
    return { ...this.record(backend).status };
  }

  epoch(backend: Backend): number {
    return this.record(backend).epoch;
  }

  bump(backend: Backend): number {
    const record = this.record(backend);
    record.epoch += 1;
    return record.epoch;
  }

  /** Returns the previous connected flag. */
  set(backend: Backend, connected: boolean, status: CadStatus = {}): boolean {
    const record = this.record(backend);
    const previous = record.connected;
    record.connected = connected;
    record.status = connected ? { ...status } : {};
    return previous;
  }

  connectedBackends(): Backend[] {
    return [...this.records].filter(([, record]) => record.connected).map(([backend]) => backend);
  }

  private record(backend: Backend): ConnectionRecord {
    const record = this.records.get(backend);
    if (!record) throw new Error(`No connection record for ${backend}`);
    return record;
  }
}
