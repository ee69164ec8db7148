export const Topics = {
  CAD_CONNECTIVITY_CHANGED: "cad:connectivity-changed",
  CAD_STATUS_UPDATED: "cad:status-updated",
  CAD_OPERATION_FAILED: "cad:operation-failed",
  CAD_PROBE_CYCLE_COMPLETED: "cad:probe-cycle-completed",
  TRANSFER_COLLECTED: "transfer:collected",
  TRANSFER_DELIVERED: "transfer:delivered",
  LOG_EVENT: "log:event",
} as const;

export type TopicName = (typeof Topics)[keyof typeof Topics];
