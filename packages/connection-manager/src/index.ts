export {
  ConnectionManager,
  type ConnectionManagerOptions
} from "./ConnectionManager.js";
export { ConnectionTable } from "./ConnectionTable.js";
export {
  ProbeMode,
  connectionManagerConfigFromEnv,
  connectionManagerConfigSchema,
  parseConnectionManagerConfig,
  type ConnectionManagerConfig,
  type ConnectionManagerConfigInput
} from "./config.js";
export type { ProbeStrategy, ProbeTask } from "./probe/ProbeStrategy.js";
export { PooledProbeStrategy, DEFAULT_POOL_SIZE } from "./probe/PooledProbeStrategy.js";
export { InlineProbeStrategy } from "./probe/InlineProbeStrategy.js";
export { createProbeStrategy } from "./probe/createProbeStrategy.js";
