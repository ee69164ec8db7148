export type {
  CadConnectivityChangedPayload,
  CadFailureKind,
  CadOperationFailedPayload,
  CadProbeCycleCompletedPayload,
  CadStatus,
  CadStatusUpdatedPayload,
  KnownTopic,
  LogEventPayload,
  TopicPayloadMap,
  TransferCollectedPayload,
  TransferDeliveredPayload
} from "./payloads.js";
export type {
  EventBusHandler,
  EventBusMiddleware,
  EventBusTopic,
  RpcCallOptions,
  RpcMethod,
  RpcRequestPayload,
  RpcResponsePayload,
  Unsubscribe
} from "./eventBus.js";
export {
  EventBus,
  RpcRemoteError,
  RpcTimeoutError,
  createEventBus,
  createEventLoggerMiddleware
} from "./eventBus.js";
export { Topics, type TopicName } from "./topics.js";
