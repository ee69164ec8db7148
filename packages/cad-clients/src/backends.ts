import { z } from "zod";

export const Backend = {
  FREECAD: "freecad",
  INVENTOR: "inventor",
  SOLIDWORKS: "solidworks",
  FUSION: "fusion",
} as const;

export type Backend = (typeof Backend)[keyof typeof Backend];

export type BackendEndpoint = {
  host: string;
  port: number;
};

export type BackendInfo = {
  id: Backend;
  displayName: string;
  endpoint: BackendEndpoint;
};

const BACKEND_INFO: Readonly<Record<Backend, BackendInfo>> = Object.freeze({
  freecad: { id: Backend.FREECAD, displayName: "FreeCAD", endpoint: { host: "localhost", port: 9876 } },
  inventor: { id: Backend.INVENTOR, displayName: "Inventor", endpoint: { host: "localhost", port: 9877 } },
  solidworks: { id: Backend.SOLIDWORKS, displayName: "SolidWorks", endpoint: { host: "localhost", port: 9878 } },
  fusion: { id: Backend.FUSION, displayName: "Fusion 360", endpoint: { host: "localhost", port: 9879 } },
});

export const BACKENDS: readonly Backend[] = Object.freeze([
  Backend.FREECAD,
  Backend.INVENTOR,
  Backend.SOLIDWORKS,
  Backend.FUSION,
]);

const ALIASES: Readonly<Record<string, Backend>> = Object.freeze({
  "fusion360": Backend.FUSION,
  "fusion 360": Backend.FUSION,
});

export function isBackend(value: unknown): value is Backend {
  return typeof value === "string" && BACKENDS.some((backend) => backend === value);
}

export function getBackendInfo(backend: Backend): BackendInfo {
  const info = BACKEND_INFO[backend];
  return { ...info, endpoint: { ...info.endpoint } };
}

export function getBackendName(backend: Backend): string {
  return BACKEND_INFO[backend].displayName;
}

/** Accepts ids and display names in any case, plus the "fusion360" spellings. */
export function parseBackend(name: string): Backend {
  const key = name.trim().toLowerCase();
  if (isBackend(key)) return key;
  const alias = ALIASES[key];
  if (alias) return alias;
  throw new Error(`Unknown CAD system: ${name}`);
}

const endpointEnvSchema = z.object({
  host: z.string().trim().min(1).optional(),
  port: z.coerce.number().int().min(1).max(65535).optional(),
});

/**
 * Default endpoint of `backend`, overridden by `CADLINK_<BACKEND>_HOST` and
 * `CADLINK_<BACKEND>_PORT` when they are set. Throws on an invalid port.
 */
export function resolveEndpoint(backend: Backend, env: NodeJS.ProcessEnv = process.env): BackendEndpoint {
  const prefix = `CADLINK_${backend.toUpperCase()}_`;
  const overrides = endpointEnvSchema.parse({
    host: env[`${prefix}HOST`] || undefined,
    port: env[`${prefix}PORT`] || undefined,
  });
  const defaults = BACKEND_INFO[backend].endpoint;
  return {
    host: overrides.host ?? defaults.host,
    port: overrides.port ?? defaults.port,
  };
}
