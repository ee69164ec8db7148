import type { Backend, BackendEndpoint } from "../backends.js";

export interface IRpcTransport {
  call(method: string, args: unknown[], timeoutMs?: number): Promise<unknown>;
  close(): void;
}

export type TransportFactory = (backend: Backend, endpoint: BackendEndpoint) => IRpcTransport;
