import { test, describe } from 'node:test';
import assert from 'node:assert';
import { Arc, Circle, Line, Point, Spline, primitiveFromData } from './primitive.js';

describe('Sketch primitives', () => {
  describe('Line', () => {
    test('clone() copies coordinates instead of sharing them', () => {
      const line = new Line('l1', { x: 0, y: 0 }, { x: 10, y: 0 });
      const cloned = line.clone();

      assert.notStrictEqual(cloned, line);
      assert.notStrictEqual(cloned.start, line.start);
      assert.deepStrictEqual(cloned.start, line.start);

      cloned.start.x = 99;
      assert.strictEqual(line.start.x, 0);
    });

    test('mapPoints() rewrites both endpoints', () => {
      const line = new Line('l1', { x: 1, y: 2 }, { x: 3, y: 4 });
      line.mapPoints((p) => ({ x: p.x * 2, y: p.y * 2 }));
      assert.deepStrictEqual(line.start, { x: 2, y: 4 });
      assert.deepStrictEqual(line.end, { x: 6, y: 8 });
      assert.strictEqual(line.length(), Math.hypot(4, 4));
    });
  });

  describe('Circle', () => {
    test('bounds include the radius, centroid uses the center only', () => {
      const circle = new Circle('c1', { x: 5, y: 5 }, 2);
      assert.deepStrictEqual(circle.representativePoints(), [{ x: 5, y: 5 }]);
      const bounds = circle.getBounds();
      assert.deepStrictEqual(bounds, { min: { x: 3, y: 3 }, max: { x: 7, y: 7 } });
    });

    test('mapPoints() leaves the radius alone', () => {
      const circle = new Circle('c1', { x: 0, y: 0 }, 4);
      circle.mapPoints((p) => ({ x: p.x + 1, y: p.y }));
      assert.deepStrictEqual(circle.center, { x: 1, y: 0 });
      assert.strictEqual(circle.radius, 4);
    });
  });

  describe('Arc', () => {
    test('fromPoints() derives the radius from center and start', () => {
      const arc = Arc.fromPoints('a1', { x: 0, y: 0 }, { x: 3, y: 4 }, { x: -5, y: 0 }, false);
      assert.strictEqual(arc.radius, 5);
      assert.strictEqual(arc.ccw, false);
      assert.strictEqual(arc.representativePoints().length, 3);
    });

    test('mapPoints() moves center and endpoints, keeps radius and direction', () => {
      const arc = new Arc('a1', { x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }, 1, true);
      arc.mapPoints((p) => ({ x: p.x, y: p.y - 1 }));
      assert.deepStrictEqual(arc.center, { x: 0, y: -1 });
      assert.deepStrictEqual(arc.startPoint, { x: 1, y: -1 });
      assert.deepStrictEqual(arc.endPoint, { x: 0, y: 0 });
      assert.strictEqual(arc.radius, 1);
      assert.strictEqual(arc.ccw, true);
    });
  });

  describe('Spline', () => {
    test('clone() copies control points and knots', () => {
      const spline = new Spline('s1', [{ x: 0, y: 0 }, { x: 1, y: 2 }, { x: 3, y: 0 }], [0, 0, 0, 1, 1, 1], 2);
      const cloned = spline.clone();
      cloned.controlPoints[1]!.y = 7;
      cloned.knots.push(2);

      assert.strictEqual(spline.controlPoints[1]!.y, 2);
      assert.deepStrictEqual(spline.knots, [0, 0, 0, 1, 1, 1]);
      assert.strictEqual(cloned.degree, 2);
    });

    test('bounds follow the control polygon', () => {
      const spline = new Spline('s1', [{ x: 0, y: 0 }, { x: 1, y: 2 }, { x: 3, y: -1 }], [], 2);
      assert.deepStrictEqual(spline.getBounds(), { min: { x: 0, y: -1 }, max: { x: 3, y: 2 } });
    });
  });

  test('toData() and primitiveFromData() agree for every kind', () => {
    const primitives = [
      new Line('l', { x: 0, y: 0 }, { x: 1, y: 1 }, true),
      new Circle('c', { x: 2, y: 2 }, 1),
      new Arc('a', { x: 0, y: 0 }, { x: 1, y: 0 }, { x: -1, y: 0 }, 1, false),
      new Point('p', { x: 4, y: -4 }),
      new Spline('s', [{ x: 0, y: 0 }, { x: 2, y: 1 }], [0, 0, 1, 1], 1),
    ];

    for (const primitive of primitives) {
      const restored = primitiveFromData(primitive.toData());
      assert.strictEqual(restored.kind, primitive.kind);
      assert.deepStrictEqual(restored.toData(), primitive.toData());
    }
  });

  test('construction flag is only written when set', () => {
    assert.deepStrictEqual(new Point('p', { x: 1, y: 1 }).toData(), {
      id: 'p',
      type: 'point',
      position: { x: 1, y: 1 },
    });
    assert.strictEqual(new Point('p', { x: 1, y: 1 }, true).toData().construction, true);
  });
});
