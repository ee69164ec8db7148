import test from "node:test";
import assert from "node:assert/strict";
import { Arc, Circle, Line, Point, SketchDocument, Spline } from "@cadlink/sketch-model";
import { Box2 } from "@cadlink/geometry";
import { representativePoints, sketchBounds, sketchCentroid } from "../src/measure.js";

function mixed(): SketchDocument {
  return new SketchDocument("mixed", {
    primitives: [
      new Line("l", { x: 0, y: 0 }, { x: 4, y: 0 }),
      new Circle("c", { x: 10, y: 10 }, 2),
      new Arc("a", { x: 0, y: 10 }, { x: 1, y: 10 }, { x: 0, y: 11 }, 1),
      new Point("p", { x: 2, y: 2 }),
      new Spline("s", [{ x: 0, y: 0 }, { x: 4, y: 4 }], [0, 0, 1, 1], 1),
    ],
  });
}

test("representativePoints: endpoints, centers, arc endpoints, positions, control points", () => {
  assert.equal(representativePoints(mixed()).length, 9);
});

test("sketchCentroid: mean of representative points", () => {
  const c = sketchCentroid(mixed());
  assert.ok(Math.abs(c.x - 21 / 9) < 1e-12);
  assert.ok(Math.abs(c.y - 47 / 9) < 1e-12);
});

test("sketchCentroid: empty sketch falls back to the origin", () => {
  assert.deepEqual(sketchCentroid(new SketchDocument("empty")), { x: 0, y: 0 });
});

test("sketchBounds: circles contribute their full extent", () => {
  assert.deepEqual(sketchBounds(mixed()), { min: { x: 0, y: 0 }, max: { x: 12, y: 12 } });
});

test("sketchBounds: empty sketch gives an empty box", () => {
  assert.equal(Box2.isEmpty(sketchBounds(new SketchDocument("empty"))), true);
});
