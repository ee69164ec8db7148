import test from "node:test";
import assert from "node:assert/strict";
import { Box2 } from "../src/box2.js";

test("Box2.create: no points gives an empty box", () => {
  const box = Box2.create([]);
  assert.equal(Box2.isEmpty(box), true);
  assert.equal(Box2.width(box), 0);
  assert.deepEqual(Box2.center(box), { x: 0, y: 0 });
});

test("Box2.create: spans every point", () => {
  const box = Box2.create([
    { x: 2, y: -1 },
    { x: -4, y: 3 },
    { x: 0, y: 0 },
  ]);
  assert.deepEqual(box, { min: { x: -4, y: -1 }, max: { x: 2, y: 3 } });
  assert.equal(Box2.width(box), 6);
  assert.equal(Box2.height(box), 4);
  assert.deepEqual(Box2.center(box), { x: -1, y: 1 });
});

test("Box2.create: a single point is a degenerate, non-empty box", () => {
  const box = Box2.create([{ x: 3, y: 3 }]);
  assert.equal(Box2.isEmpty(box), false);
  assert.equal(Box2.width(box), 0);
});

test("Box2.union: empty box is the identity", () => {
  const a = Box2.create([{ x: 1, y: 1 }, { x: 2, y: 5 }]);
  assert.deepEqual(Box2.union(Box2.empty(), a), a);
});
