export type CadStatus = Record<string, unknown>;

export type CadConnectivityChangedPayload = {
  backend: string;
  connected: boolean;
};

export type CadStatusUpdatedPayload = {
  backend: string;
  status: CadStatus;
};

/**
 * `connection`: connect or liveness probe failed, the backend is now disconnected.
 * `operation`: a call failed while the backend was believed connected.
 * `best-effort`: a side effect such as opening an imported sketch failed.
 */
export type CadFailureKind = "connection" | "operation" | "best-effort";

export type CadOperationFailedPayload = {
  backend: string;
  kind: CadFailureKind;
  operation: string;
  message: string;
};

export type CadProbeCycleCompletedPayload = {
  connected: string[];
  durationMs: number;
};

export type TransferCollectedPayload = {
  backend: string;
  outcome: "no-sketches" | "cancelled" | "nothing-selected" | "collected";
  requested: number;
  collected: number;
  failed: string[];
};

export type TransferDeliveredPayload = {
  backend: string;
  sketch: string;
  createdName: string | null;
  transformed: boolean;
};

export type LogEventPayload = {
  topic: string;
  payload: unknown;
};

type TopicsConst = typeof import("./topics.js").Topics;

export type TopicPayloadMap = {
  [K in TopicsConst["CAD_CONNECTIVITY_CHANGED"]]: CadConnectivityChangedPayload;
} & {
  [K in TopicsConst["CAD_STATUS_UPDATED"]]: CadStatusUpdatedPayload;
} & {
  [K in TopicsConst["CAD_OPERATION_FAILED"]]: CadOperationFailedPayload;
} & {
  [K in TopicsConst["CAD_PROBE_CYCLE_COMPLETED"]]: CadProbeCycleCompletedPayload;
} & {
  [K in TopicsConst["TRANSFER_COLLECTED"]]: TransferCollectedPayload;
} & {
  [K in TopicsConst["TRANSFER_DELIVERED"]]: TransferDeliveredPayload;
} & {
  [K in TopicsConst["LOG_EVENT"]]: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
