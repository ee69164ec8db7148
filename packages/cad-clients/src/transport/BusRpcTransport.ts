import type { EventBus } from "@cadlink/event-bus";
import type { Backend, BackendEndpoint } from "../backends.js";
import type { IRpcTransport, TransportFactory } from "./RpcTransport.js";

export function busServiceName(backend: Backend, endpoint: BackendEndpoint): string {
  return `cad:${backend}@${endpoint.host}:${endpoint.port}`;
}

/**
 * Sends calls through the event bus RPC layer. The backend side is whatever
 * registered {@link busServiceName} with `bus.rpcService`, usually a bridge
 * process relaying to the CAD plugin.
 */
export class BusRpcTransport implements IRpcTransport {
  private closed = false;

  constructor(
    private readonly bus: EventBus,
    readonly service: string,
  ) {}

  call(method: string, args: unknown[], timeoutMs?: number): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new Error(`Transport to ${this.service} is closed`));
    }
    return this.bus.rpcRequest<unknown>(this.service, method, args, { timeoutMs });
  }

  close(): void {
    this.closed = true;
  }
}

export function createBusTransportFactory(bus: EventBus): TransportFactory {
  return (backend, endpoint) => new BusRpcTransport(bus, busServiceName(backend, endpoint));
}
