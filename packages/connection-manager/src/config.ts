import { z } from "zod";

export const ProbeMode = {
  POOLED: "pooled",
  INLINE: "inline",
} as const;

export type ProbeMode = (typeof ProbeMode)[keyof typeof ProbeMode];

export const connectionManagerConfigSchema = z.object({
  probeIntervalMs: z.number().int().positive().default(5_000),
  probeTimeoutMs: z.number().int().positive().default(1_000),
  connectTimeoutMs: z.number().int().positive().default(5_000),
  /** Re-check backends already marked connected instead of trusting the cached flag. */
  revalidateConnected: z.boolean().default(false),
  probeMode: z.enum([ProbeMode.POOLED, ProbeMode.INLINE]).default(ProbeMode.POOLED),
  poolSize: z.number().int().min(1).max(16).default(4),
});

export type ConnectionManagerConfig = z.output<typeof connectionManagerConfigSchema>;
export type ConnectionManagerConfigInput = z.input<typeof connectionManagerConfigSchema>;

export function parseConnectionManagerConfig(input: unknown = {}): ConnectionManagerConfig {
  return connectionManagerConfigSchema.parse(input);
}

const envFlag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]))
  .transform((value) => value === "true" || value === "1" || value === "yes" || value === "on");

const envSchema = z.object({
  CADLINK_PROBE_INTERVAL_MS: z.coerce.number().optional(),
  CADLINK_PROBE_TIMEOUT_MS: z.coerce.number().optional(),
  CADLINK_CONNECT_TIMEOUT_MS: z.coerce.number().optional(),
  CADLINK_REVALIDATE_CONNECTED: envFlag.optional(),
  CADLINK_PROBE_MODE: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .optional(),
  CADLINK_POOL_SIZE: z.coerce.number().optional(),
});

const ENV_KEYS = [
  "CADLINK_PROBE_INTERVAL_MS",
  "CADLINK_PROBE_TIMEOUT_MS",
  "CADLINK_CONNECT_TIMEOUT_MS",
  "CADLINK_REVALIDATE_CONNECTED",
  "CADLINK_PROBE_MODE",
  "CADLINK_POOL_SIZE",
] as const;

/** Unset and empty variables fall back to the defaults; anything else must be valid. */
export function connectionManagerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConnectionManagerConfig {
  const raw: Record<string, string | undefined> = {};
  for (const key of ENV_KEYS) {
    raw[key] = env[key] || undefined;
  }
  const vars = envSchema.parse(raw);

  return parseConnectionManagerConfig({
    probeIntervalMs: vars.CADLINK_PROBE_INTERVAL_MS,
    probeTimeoutMs: vars.CADLINK_PROBE_TIMEOUT_MS,
    connectTimeoutMs: vars.CADLINK_CONNECT_TIMEOUT_MS,
    revalidateConnected: vars.CADLINK_REVALIDATE_CONNECTED,
    probeMode: vars.CADLINK_PROBE_MODE,
    poolSize: vars.CADLINK_POOL_SIZE,
  });
}
