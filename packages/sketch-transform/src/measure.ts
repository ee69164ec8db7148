import { Box2, Vec2 } from "@cadlink/geometry";
import type { SketchDocument } from "@cadlink/sketch-model";

export function representativePoints(doc: SketchDocument): Vec2[] {
  const points: Vec2[] = [];
  for (const primitive of doc.primitives.values()) {
    points.push(...primitive.representativePoints());
  }
  return points;
}

/** Mean of the sketch's representative points; the origin for an empty sketch. */
export function sketchCentroid(doc: SketchDocument): Vec2 {
  return Vec2.mean(representativePoints(doc)) ?? Vec2.origin();
}

/** Empty box for a sketch without primitives. */
export function sketchBounds(doc: SketchDocument): Box2 {
  let box = Box2.empty();
  for (const primitive of doc.primitives.values()) {
    box = Box2.union(box, primitive.getBounds());
  }
  return box;
}
