import type { KnownTopic, TopicPayloadMap } from "./payloads.js";

export type EventBusTopic = KnownTopic | (string & {});

export type EventBusHandler<TPayload = unknown> = (payload: TPayload) => void;

export type Unsubscribe = () => void;

export type EventBusMiddleware = (
  event: {
    topic: EventBusTopic;
    payload: unknown;
  },
  next: () => void,
  bus: EventBus,
) => void;

export type RpcMethod = (...args: unknown[]) => unknown;

export interface RpcRequestPayload {
  requestId: string;
  args: unknown[];
}

export interface RpcResponsePayload<T = unknown> {
  requestId: string;
  result?: T;
  error?: string;
}

export type RpcCallOptions = {
  /** Rejects with {@link RpcTimeoutError} when no response arrives in time. */
  timeoutMs?: number;
};

export class RpcTimeoutError extends Error {
  constructor(
    readonly service: string,
    readonly method: string,
    readonly timeoutMs: number,
  ) {
    super(`RPC ${service}.${method} timed out after ${timeoutMs}ms`);
    this.name = "RpcTimeoutError";
  }
}

export class RpcRemoteError extends Error {
  constructor(
    readonly service: string,
    readonly method: string,
    message: string,
  ) {
    super(message);
    this.name = "RpcRemoteError";
  }
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || String(error);
  return String(error);
}

function isRpcRequest(payload: unknown): payload is RpcRequestPayload {
  if (typeof payload !== "object" || payload === null) return false;
  return "requestId" in payload && "args" in payload && Array.isArray(payload.args);
}

function isRpcResponse(payload: unknown): payload is RpcResponsePayload {
  return typeof payload === "object" && payload !== null && "requestId" in payload;
}

export class EventBus {
  private handlersByTopic = new Map<EventBusTopic, Set<EventBusHandler>>();
  private middlewares: EventBusMiddleware[] = [];
  private requestSequence = 0;

  constructor(options?: { middlewares?: EventBusMiddleware[] }) {
    this.middlewares = options?.middlewares ?? [];
  }

  rpcService(service: string, methods: Record<string, RpcMethod>): Unsubscribe {
    const unsubscribes: Unsubscribe[] = [];

    for (const [methodName, methodImpl] of Object.entries(methods)) {
      const requestTopic = `rpc:request:${service}:${methodName}`;

      unsubscribes.push(
        this.subscribe(requestTopic, (payload: unknown) => {
          if (!isRpcRequest(payload)) return;
          const { requestId, args } = payload;
          const responseTopic = `rpc:response:${service}:${methodName}:${requestId}`;

          // Handlers run after publish() returns so a synchronous service cannot re-enter the caller.
          void Promise.resolve()
            .then(() => methodImpl(...args))
            .then(
              (result) => this.publish(responseTopic, { requestId, result }),
              (error: unknown) => this.publish(responseTopic, { requestId, error: errorMessage(error) }),
            );
        }),
      );
    }

    return () => {
      for (const unsub of unsubscribes) unsub();
    };
  }

  rpcCall<TResult = unknown>(service: string, method: string, ...args: unknown[]): Promise<TResult> {
    return this.rpcRequest<TResult>(service, method, args);
  }

  rpcRequest<TResult = unknown>(
    service: string,
    method: string,
    args: unknown[],
    options: RpcCallOptions = {},
  ): Promise<TResult> {
    return new Promise<TResult>((resolve, reject) => {
      this.requestSequence += 1;
      const requestId = `${this.requestSequence.toString(36)}-${Math.random().toString(36).substring(2, 10)}`;
      const requestTopic = `rpc:request:${service}:${method}`;
      const responseTopic = `rpc:response:${service}:${method}:${requestId}`;
      let timer: ReturnType<typeof setTimeout> | null = null;

      const unsubscribe = this.subscribe(responseTopic, (payload: unknown) => {
        if (!isRpcResponse(payload)) return;

        unsubscribe();
        if (timer) clearTimeout(timer);

        if (payload.error !== undefined) {
          reject(new RpcRemoteError(service, method, payload.error));
        } else {
          // The response payload is untyped on the wire; callers validate what they receive.
          resolve(payload.result as TResult);
        }
      });

      if (options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        timer = setTimeout(() => {
          unsubscribe();
          reject(new RpcTimeoutError(service, method, timeoutMs));
        }, timeoutMs);
      }

      this.publish(requestTopic, { requestId, args });
    });
  }

  subscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): Unsubscribe;
  subscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): Unsubscribe;
  subscribe(topic: EventBusTopic, handler: EventBusHandler<never>): Unsubscribe {
    const set = this.handlersByTopic.get(topic) ?? new Set<EventBusHandler>();
    // Handlers are stored untyped; the overloads above tie each topic to its payload type.
    const stored = handler as EventBusHandler;
    set.add(stored);
    this.handlersByTopic.set(topic, set);

    return () => {
      this.removeHandler(topic, stored);
    };
  }

  unsubscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): void;
  unsubscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): void;
  unsubscribe(topic: EventBusTopic, handler: EventBusHandler<never>): void {
    this.removeHandler(topic, handler as EventBusHandler);
  }

  publish<TTopic extends KnownTopic>(topic: TTopic, payload: TopicPayloadMap[TTopic]): void;
  publish<TPayload>(topic: EventBusTopic, payload: TPayload): void;
  publish(topic: EventBusTopic, payload: unknown): void {
    const event = { topic, payload };

    const dispatch = () => {
      const set = this.handlersByTopic.get(topic);
      if (!set) return;
      for (const handler of [...set]) {
        handler(payload);
      }
    };

    if (this.middlewares.length === 0) {
      dispatch();
      return;
    }

    let index = -1;
    const run = (i: number) => {
      if (i <= index) return;
      index = i;
      const middleware = this.middlewares[i];
      if (!middleware) {
        dispatch();
        return;
      }
      middleware(event, () => run(i + 1), this);
    };

    run(0);
  }

  destroy(): void {
    this.handlersByTopic.clear();
    this.middlewares = [];
  }

  private removeHandler(topic: EventBusTopic, handler: EventBusHandler): void {
    const set = this.handlersByTopic.get(topic);
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) this.handlersByTopic.delete(topic);
  }
}

export function createEventBus(options?: { middlewares?: EventBusMiddleware[] }): EventBus {
  return new EventBus(options);
}

export function createEventLoggerMiddleware(options: {
  ignoreTopics?: EventBusTopic[];
  ignorePrefixes?: string[];
  logTopic: EventBusTopic;
}): EventBusMiddleware {
  const ignore = new Set(options.ignoreTopics ?? []);
  const prefixes = options.ignorePrefixes ?? [];

  return (event, next, bus) => {
    next();

    if (event.topic === options.logTopic || ignore.has(event.topic)) return;
    if (prefixes.some((prefix) => event.topic.startsWith(prefix))) return;

    bus.publish(options.logTopic, { topic: event.topic, payload: event.payload });
  };
}
