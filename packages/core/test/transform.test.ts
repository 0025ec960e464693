import { describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  compose,
  intersectLinePlane,
  inverse,
  rotationX,
  rotationY,
  rotationZ,
  rotationZYX,
  transformPoint,
  translation,
  yAxis
} from "../src/index.js";

describe("rigid transforms", () => {
  it("applies the rightmost transform first", () => {
    const t = compose(translation(1, 2, 3), rotationX(Math.PI / 2));
    const p = transformPoint(t, { x: 0, y: 1, z: 0 });
    expect(p.x).toBeCloseTo(1, 12);
    expect(p.y).toBeCloseTo(2, 12);
    expect(p.z).toBeCloseTo(4, 12);
  });

  it("builds ZYX euler rotations as Rz * Ry * Rx", () => {
    const a = rotationZYX(0.3, -0.5, 0.2);
    const b = compose(rotationZ(0.2), rotationY(-0.5), rotationX(0.3));
    for (let i = 0; i < 16; i++) {
      expect(a.elements[i]).toBeCloseTo(b.elements[i], 12);
    }
  });

  it("exposes the rotated axes", () => {
    const axis = yAxis(rotationX(Math.PI / 2));
    expect(axis.x).toBeCloseTo(0, 12);
    expect(axis.y).toBeCloseTo(0, 12);
    expect(axis.z).toBeCloseTo(1, 12);
  });

  it("freezes transform elements", () => {
    expect(Object.isFrozen(translation(1, 1, 1).elements)).toBe(true);
  });

  it("property: inverse undoes the transform", () => {
    const angle = fc.double({ min: -Math.PI, max: Math.PI, noNaN: true });
    const coord = fc.double({ min: -100, max: 100, noNaN: true });
    fc.assert(
      fc.property(angle, angle, coord, coord, coord, (a, b, x, y, z) => {
        const t = compose(translation(x, y, z), rotationY(a), rotationX(b));
        const p = { x: z, y: x, z: y };
        const back = transformPoint(inverse(t), transformPoint(t, p));
        return Math.abs(back.x - p.x) < 1e-9 && Math.abs(back.y - p.y) < 1e-9 && Math.abs(back.z - p.z) < 1e-9;
      })
    );
  });
});

describe("intersectLinePlane", () => {
  it("finds the crossing point", () => {
    const hit = intersectLinePlane({ x: 0, y: 0, z: 5 }, { x: 0, y: 0, z: -1 }, { x: 3, y: 3, z: 1 }, { x: 0, y: 0, z: 1 });
    expect(hit).toEqual({ x: 0, y: 0, z: 1 });
  });

  it("returns undefined for parallel lines", () => {
    expect(intersectLinePlane({ x: 0, y: 0, z: 5 }, { x: 1, y: 0, z: 0 }, { x: 0, y: 0, z: 0 }, { x: 0, y: 0, z: 1 })).toBeUndefined();
  });
});
