import axios, { AxiosError, type AxiosInstance } from "axios";
import { z } from "zod";
import { RpcRemoteError, RpcTimeoutError } from "@cadlink/event-bus";
import type { Backend, BackendEndpoint } from "../backends.js";
import { CadProtocolError, CadUnreachableError } from "../errors.js";
import type { IRpcTransport, TransportFactory } from "./RpcTransport.js";

const rpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.string(), z.number(), z.null()]),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number().int(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const TIMEOUT_CODES = new Set<string>([AxiosError.ECONNABORTED, AxiosError.ETIMEDOUT]);

export type HttpTransportOptions = {
  /** Shared axios instance; each transport creates its own otherwise. */
  client?: AxiosInstance;
  /** Request path on the endpoint. */
  path?: string;
};

/**
 * JSON-RPC 2.0 over HTTP: one `POST http://<host>:<port>/` per call, the
 * call's arguments as positional `params`.
 */
export class HttpRpcTransport implements IRpcTransport {
  readonly url: string;
  private readonly client: AxiosInstance;
  private closed = false;
  private sequence = 0;

  constructor(
    readonly backend: Backend,
    endpoint: BackendEndpoint,
    options: HttpTransportOptions = {},
  ) {
    this.url = `http://${endpoint.host}:${endpoint.port}${options.path ?? "/"}`;
    this.client = options.client ?? axios.create();
  }

  async call(method: string, args: unknown[], timeoutMs?: number): Promise<unknown> {
    if (this.closed) throw new Error(`Transport to ${this.url} is closed`);

    this.sequence += 1;
    const response = await this.client
      .post<unknown>(
        this.url,
        { jsonrpc: "2.0", id: this.sequence, method, params: args },
        {
          timeout: timeoutMs ?? 0,
          headers: { "Content-Type": "application/json" },
          validateStatus: () => true,
        },
      )
      .catch((error: unknown) => {
        throw this.translate(error, method, timeoutMs);
      });

    const parsed = rpcResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      if (response.status >= 400) throw new RpcRemoteError(this.url, method, `HTTP ${response.status}`);
      throw new CadProtocolError(this.backend, method, parsed.error);
    }
    if (parsed.data.error) throw new RpcRemoteError(this.url, method, parsed.data.error.message);
    return parsed.data.result;
  }

  close(): void {
    this.closed = true;
  }

  private translate(error: unknown, method: string, timeoutMs: number | undefined): unknown {
    if (!axios.isAxiosError(error)) return error;
    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return new RpcTimeoutError(this.url, method, timeoutMs ?? 0);
    }
    if (!error.response) return new CadUnreachableError(this.backend, method, error.message);
    return error;
  }
}

export function createHttpTransportFactory(options: HttpTransportOptions = {}): TransportFactory {
  return (backend, endpoint) => new HttpRpcTransport(backend, endpoint, options);
}
