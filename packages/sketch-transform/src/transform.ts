import { Vec2, degToRad } from "@cadlink/geometry";
import type { SketchDocument } from "@cadlink/sketch-model";
import { sketchCentroid } from "./measure.js";
import { resolveTransformRequest, type PivotPolicy, type TransformRequest } from "./request.js";

/**
 * Rotates `p` about `pivot` and then translates it. The pivot lives in the
 * untransformed frame, so swapping the two steps gives a different result
 * whenever both an angle and an offset are set.
 */
export function transformPoint(p: Vec2, dx: number, dy: number, angleDeg: number, pivot: Vec2 = Vec2.origin()): Vec2 {
  const rotated = angleDeg === 0 ? p : Vec2.rotateAround(p, pivot, degToRad(angleDeg));
  return { x: rotated.x + dx, y: rotated.y + dy };
}

export function resolvePivot(doc: SketchDocument, pivot: PivotPolicy, angleDeg: number): Vec2 {
  if (typeof pivot === "object") return Vec2.clone(pivot);
  if (pivot === "centroid" && angleDeg !== 0) return sketchCentroid(doc);
  return Vec2.origin();
}

/**
 * Returns a transformed deep copy of `doc`; `doc` itself is never modified.
 *
 * Constraints are copied unless `stripConstraints` is set, and are never
 * re-solved against the moved geometry.
 */
export function transformSketch(doc: SketchDocument, request: Partial<TransformRequest> = {}): SketchDocument {
  const { dx, dy, angleDeg, pivot, stripConstraints } = resolveTransformRequest(request);

  const copy = doc.clone();

  if (stripConstraints) {
    copy.constraints = [];
  }

  const center = resolvePivot(doc, pivot, angleDeg);

  for (const primitive of copy.primitives.values()) {
    primitive.mapPoints((p) => transformPoint(p, dx, dy, angleDeg, center));
  }

  return copy;
}

export function translateSketch(doc: SketchDocument, dx: number, dy: number): SketchDocument {
  return transformSketch(doc, { dx, dy });
}

export function rotateSketch(doc: SketchDocument, angleDeg: number, pivot: PivotPolicy = "centroid"): SketchDocument {
  return transformSketch(doc, { angleDeg, pivot });
}
