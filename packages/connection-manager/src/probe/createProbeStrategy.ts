import { ProbeMode, type ConnectionManagerConfig } from "../config.js";
import { InlineProbeStrategy } from "./InlineProbeStrategy.js";
import { PooledProbeStrategy } from "./PooledProbeStrategy.js";
import type { ProbeStrategy } from "./ProbeStrategy.js";

export function createProbeStrategy(config: Pick<ConnectionManagerConfig, "probeMode" | "poolSize">): ProbeStrategy {
  switch (config.probeMode) {
    case ProbeMode.POOLED:
      return new PooledProbeStrategy(config.poolSize);
    case ProbeMode.INLINE:
      return new InlineProbeStrategy();
  }
}
