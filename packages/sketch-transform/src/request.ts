import { z } from "zod";
import { vec2Schema } from "@cadlink/sketch-model";
import type { Vec2 } from "@cadlink/geometry";

/** Where a rotation is centred: the sketch origin, the sketch centroid, or an explicit point. */
export type PivotPolicy = "origin" | "centroid" | Vec2;

export type TransformRequest = {
  dx: number;
  dy: number;
  /** Counter-clockwise, degrees. */
  angleDeg: number;
  pivot: PivotPolicy;
  stripConstraints: boolean;
};

export const DEFAULT_TRANSFORM: Readonly<TransformRequest> = Object.freeze({
  dx: 0,
  dy: 0,
  angleDeg: 0,
  pivot: "centroid",
  stripConstraints: false,
});

export const transformRequestSchema = z.object({
  dx: z.number().finite().default(0),
  dy: z.number().finite().default(0),
  angleDeg: z.number().finite().default(0),
  pivot: z.union([z.literal("origin"), z.literal("centroid"), vec2Schema]).default("centroid"),
  stripConstraints: z.boolean().default(false),
});

export function parseTransformRequest(input: unknown): TransformRequest {
  return transformRequestSchema.parse(input ?? {});
}

export function resolveTransformRequest(partial: Partial<TransformRequest> = {}): TransformRequest {
  return {
    dx: partial.dx ?? DEFAULT_TRANSFORM.dx,
    dy: partial.dy ?? DEFAULT_TRANSFORM.dy,
    angleDeg: partial.angleDeg ?? DEFAULT_TRANSFORM.angleDeg,
    pivot: partial.pivot ?? DEFAULT_TRANSFORM.pivot,
    stripConstraints: partial.stripConstraints ?? DEFAULT_TRANSFORM.stripConstraints,
  };
}

/**
 * True when applying the request would leave geometry and constraints untouched.
 * The pivot alone never changes anything.
 */
export function isIdentityTransform(request: Partial<TransformRequest>): boolean {
  const { dx, dy, angleDeg, stripConstraints } = resolveTransformRequest(request);
  return dx === 0 && dy === 0 && angleDeg === 0 && !stripConstraints;
}
