import { Box2, Vec2 } from '@cadlink/geometry';
import type { PrimitiveData, PrimitiveKind } from './schema.js';

export type PointMapper = (p: Vec2) => Vec2;

/**
 * A sketch entity whose geometry is fully described by 2D coordinate pairs.
 * Scalar properties (radii, arc direction, spline knots) are never touched by {@link mapPoints}.
 */
export abstract class SketchPrimitive {
  abstract readonly kind: PrimitiveKind;
  readonly id: string;
  construction: boolean;

  constructor(id: string, construction: boolean = false) {
    this.id = id;
    this.construction = construction;
  }

  abstract clone(): SketchPrimitive;

  /** Points that stand for this primitive when averaging a sketch's position. */
  abstract representativePoints(): Vec2[];

  /** Rewrites every coordinate pair in place. */
  abstract mapPoints(fn: PointMapper): void;

  abstract getBounds(): Box2;
  abstract toData(): PrimitiveData;

  protected baseData(): { id: string; construction?: boolean } {
    return this.construction ? { id: this.id, construction: true } : { id: this.id };
  }
}

export class Line extends SketchPrimitive {
  readonly kind = 'line';
  start: Vec2;
  end: Vec2;

  constructor(id: string, start: Vec2, end: Vec2, construction?: boolean) {
    super(id, construction);
    this.start = start;
    this.end = end;
  }

  clone(): Line {
    return new Line(this.id, Vec2.clone(this.start), Vec2.clone(this.end), this.construction);
  }

  representativePoints(): Vec2[] {
    return [this.start, this.end];
  }

  mapPoints(fn: PointMapper): void {
    this.start = fn(this.start);
    this.end = fn(this.end);
  }

  getBounds(): Box2 {
    return Box2.create([this.start, this.end]);
  }

  length(): number {
    return Vec2.dist(this.start, this.end);
  }

  toData(): PrimitiveData {
    return { ...this.baseData(), type: 'line', start: Vec2.clone(this.start), end: Vec2.clone(this.end) };
  }
}

export class Circle extends SketchPrimitive {
  readonly kind = 'circle';
  center: Vec2;
  radius: number;

  constructor(id: string, center: Vec2, radius: number, construction?: boolean) {
    super(id, construction);
    this.center = center;
    this.radius = radius;
  }

  clone(): Circle {
    return new Circle(this.id, Vec2.clone(this.center), this.radius, this.construction);
  }

  representativePoints(): Vec2[] {
    return [this.center];
  }

  mapPoints(fn: PointMapper): void {
    this.center = fn(this.center);
  }

  getBounds(): Box2 {
    const { center: c, radius: r } = this;
    return Box2.create([
      { x: c.x - r, y: c.y - r },
      { x: c.x + r, y: c.y + r },
    ]);
  }

  toData(): PrimitiveData {
    return { ...this.baseData(), type: 'circle', center: Vec2.clone(this.center), radius: this.radius };
  }
}

export class Arc extends SketchPrimitive {
  readonly kind = 'arc';
  center: Vec2;
  startPoint: Vec2;
  endPoint: Vec2;
  radius: number;
  ccw: boolean;

  constructor(
    id: string,
    center: Vec2,
    startPoint: Vec2,
    endPoint: Vec2,
    radius: number,
    ccw: boolean = true,
    construction?: boolean
  ) {
    super(id, construction);
    this.center = center;
    this.startPoint = startPoint;
    this.endPoint = endPoint;
    this.radius = radius;
    this.ccw = ccw;
  }

  /** Builds an arc from its center and endpoints; the radius is the center-to-start distance. */
  static fromPoints(id: string, center: Vec2, startPoint: Vec2, endPoint: Vec2, ccw: boolean = true): Arc {
    return new Arc(id, center, startPoint, endPoint, Vec2.dist(center, startPoint), ccw);
  }

  clone(): Arc {
    return new Arc(
      this.id,
      Vec2.clone(this.center),
      Vec2.clone(this.startPoint),
      Vec2.clone(this.endPoint),
      this.radius,
      this.ccw,
      this.construction
    );
  }

  representativePoints(): Vec2[] {
    return [this.center, this.startPoint, this.endPoint];
  }

  mapPoints(fn: PointMapper): void {
    this.center = fn(this.center);
    this.startPoint = fn(this.startPoint);
    this.endPoint = fn(this.endPoint);
  }

  getBounds(): Box2 {
    // Loose on purpose: quadrant extremes of the sweep are not included.
    return Box2.create([this.center, this.startPoint, this.endPoint]);
  }

  toData(): PrimitiveData {
    return {
      ...this.baseData(),
      type: 'arc',
      center: Vec2.clone(this.center),
      startPoint: Vec2.clone(this.startPoint),
      endPoint: Vec2.clone(this.endPoint),
      radius: this.radius,
      ccw: this.ccw,
    };
  }
}

export class Point extends SketchPrimitive {
  readonly kind = 'point';
  position: Vec2;

  constructor(id: string, position: Vec2, construction?: boolean) {
    super(id, construction);
    this.position = position;
  }

  clone(): Point {
    return new Point(this.id, Vec2.clone(this.position), this.construction);
  }

  representativePoints(): Vec2[] {
    return [this.position];
  }

  mapPoints(fn: PointMapper): void {
    this.position = fn(this.position);
  }

  getBounds(): Box2 {
    return Box2.create([this.position]);
  }

  toData(): PrimitiveData {
    return { ...this.baseData(), type: 'point', position: Vec2.clone(this.position) };
  }
}

export class Spline extends SketchPrimitive {
  readonly kind = 'spline';
  controlPoints: Vec2[];
  knots: number[];
  degree: number;

  constructor(id: string, controlPoints: Vec2[], knots: number[], degree: number, construction?: boolean) {
    super(id, construction);
    this.controlPoints = controlPoints;
    this.knots = knots;
    this.degree = degree;
  }

  clone(): Spline {
    return new Spline(
      this.id,
      this.controlPoints.map(Vec2.clone),
      [...this.knots],
      this.degree,
      this.construction
    );
  }

  representativePoints(): Vec2[] {
    return [...this.controlPoints];
  }

  mapPoints(fn: PointMapper): void {
    this.controlPoints = this.controlPoints.map((p) => fn(p));
  }

  getBounds(): Box2 {
    // The control polygon's hull contains the curve.
    return Box2.create(this.controlPoints);
  }

  toData(): PrimitiveData {
    return {
      ...this.baseData(),
      type: 'spline',
      controlPoints: this.controlPoints.map(Vec2.clone),
      knots: [...this.knots],
      degree: this.degree,
    };
  }
}

export function primitiveFromData(data: PrimitiveData): SketchPrimitive {
  const construction = data.construction ?? false;
  switch (data.type) {
    case 'line':
      return new Line(data.id, Vec2.clone(data.start), Vec2.clone(data.end), construction);
    case 'circle':
      return new Circle(data.id, Vec2.clone(data.center), data.radius, construction);
    case 'arc':
      return new Arc(
        data.id,
        Vec2.clone(data.center),
        Vec2.clone(data.startPoint),
        Vec2.clone(data.endPoint),
        data.radius,
        data.ccw,
        construction
      );
    case 'point':
      return new Point(data.id, Vec2.clone(data.position), construction);
    case 'spline':
      return new Spline(data.id, data.controlPoints.map(Vec2.clone), [...data.knots], data.degree, construction);
  }
}
