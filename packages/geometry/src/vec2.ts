export interface Vec2 {
  x: number;
  y: number;
}

export const Vec2 = {
  create: (x: number = 0, y: number = 0): Vec2 => ({ x, y }),

  origin: (): Vec2 => ({ x: 0, y: 0 }),

  dist: (a: Vec2, b: Vec2): number => Math.hypot(a.x - b.x, a.y - b.y),

  // Counter-clockwise, radians.
  rotate: (v: Vec2, angle: number): Vec2 => {
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    return { x: v.x * c - v.y * s, y: v.x * s + v.y * c };
  },

  rotateAround: (p: Vec2, pivot: Vec2, angle: number): Vec2 => {
    const c = Math.cos(angle);
    const s = Math.sin(angle);
    const rx = p.x - pivot.x;
    const ry = p.y - pivot.y;
    return { x: rx * c - ry * s + pivot.x, y: rx * s + ry * c + pivot.y };
  },

  /** Arithmetic mean of the points, or null for an empty list. */
  mean: (points: readonly Vec2[]): Vec2 | null => {
    if (points.length === 0) return null;
    let sx = 0;
    let sy = 0;
    for (const p of points) {
      sx += p.x;
      sy += p.y;
    }
    return { x: sx / points.length, y: sy / points.length };
  },

  equals: (a: Vec2, b: Vec2, epsilon: number = 0): boolean => {
    if (epsilon === 0) return a.x === b.x && a.y === b.y;
    return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon;
  },

  clone: (v: Vec2): Vec2 => ({ x: v.x, y: v.y }),
};

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}
