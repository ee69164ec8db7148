import { Vec2 } from './vec2.js';

export interface Box2 {
  min: Vec2;
  max: Vec2;
}

export const Box2 = {
  empty: (): Box2 => ({
    min: { x: Infinity, y: Infinity },
    max: { x: -Infinity, y: -Infinity },
  }),

  create: (points?: readonly Vec2[]): Box2 => {
    let box = Box2.empty();
    for (const p of points ?? []) {
      box = Box2.expand(box, p);
    }
    return box;
  },

  expand: (box: Box2, p: Vec2): Box2 => ({
    min: { x: Math.min(box.min.x, p.x), y: Math.min(box.min.y, p.y) },
    max: { x: Math.max(box.max.x, p.x), y: Math.max(box.max.y, p.y) },
  }),

  union: (a: Box2, b: Box2): Box2 => ({
    min: { x: Math.min(a.min.x, b.min.x), y: Math.min(a.min.y, b.min.y) },
    max: { x: Math.max(a.max.x, b.max.x), y: Math.max(a.max.y, b.max.y) },
  }),

  isEmpty: (box: Box2): boolean => box.min.x > box.max.x || box.min.y > box.max.y,

  width: (box: Box2): number => (Box2.isEmpty(box) ? 0 : box.max.x - box.min.x),
  height: (box: Box2): number => (Box2.isEmpty(box) ? 0 : box.max.y - box.min.y),

  center: (box: Box2): Vec2 => {
    if (Box2.isEmpty(box)) return Vec2.origin();
    return {
      x: (box.min.x + box.max.x) / 2,
      y: (box.min.y + box.max.y) / 2,
    };
  },
};
