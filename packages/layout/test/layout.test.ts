import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { dot, isFiniteTransform, position, yAxis, zAxis, type RigidTransform } from "@keyshell/core";
import { defaultConfig, type ColumnSpec, type Config } from "@keyshell/config";
import {
  allKeys,
  CENTER_OFFSET,
  convexHull,
  keyCorners,
  placeColumns,
  placeThumbKeys,
  solveLayout,
  thumbClusterTransform,
  Z_OFFSET,
  type LayoutResult
} from "../src/index.js";

function solve(config: Config): LayoutResult {
  const result = solveLayout(config);
  if (!result.ok) throw result.error;
  return result.value;
}

function angleBetween(a: RigidTransform, b: RigidTransform): number {
  const cos = Math.min(1, Math.max(-1, dot(yAxis(a), yAxis(b))));
  return (Math.acos(cos) * 180) / Math.PI;
}

function columnsWithSides(count: number, curvature: (i: number) => number): ColumnSpec[] {
  if (count === 2) {
    return [
      { kind: "side", sideAngle: 25 },
      { kind: "normal", curvatureAngle: curvature(1), offset: { y: 0, z: 0 } }
    ];
  }
  const columns: ColumnSpec[] = [{ kind: "side", sideAngle: 15 }];
  for (let i = 1; i < count - 1; i++) {
    columns.push({ kind: "normal", curvatureAngle: curvature(i), offset: { y: i, z: -i / 2 } });
  }
  columns.push({ kind: "side", sideAngle: 30 });
  return columns;
}

describe("solveLayout", () => {
  it("produces rows x columns finger keys and the configured thumb keys", () => {
    const layout = solve(defaultConfig());
    expect(layout.columns).toHaveLength(6);
    expect(layout.columns.flatMap((column) => column.keys)).toHaveLength(18);
    expect(layout.thumbKeys).toHaveLength(3);
    expect(allKeys(layout)).toHaveLength(21);
  });

  it("is deterministic", () => {
    const a = solve(defaultConfig());
    const b = solve(defaultConfig());
    expect(allKeys(a).map((key) => key.elements)).toEqual(allKeys(b).map((key) => key.elements));
  });

  it("rejects invalid configs before solving", () => {
    const config = defaultConfig();
    config.fingerCluster.rows = 0;
    const result = solveLayout(config);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues.map((issue) => issue.path)).toContain("fingerCluster.rows");
  });

  it("places the lowest key at the ground offset and keeps the footprint margin", () => {
    const config = defaultConfig();
    const layout = solve(config);
    const lowest = Math.min(...allKeys(layout).map((key) => position(key).z));
    expect(lowest).toBeCloseTo(Z_OFFSET, 9);

    const fingerKeys = layout.columns.flatMap((column) => column.keys);
    const corners = [
      ...keyCorners(fingerKeys, layout.fingerKeyClearance),
      ...keyCorners(layout.thumbKeys, layout.thumbKeyClearance)
    ];
    const minX = Math.min(...corners.map((corner) => corner.x));
    expect(minX).toBeCloseTo(CENTER_OFFSET + config.keyboard.circumferenceDistance, 9);
  });

  it("derives the key clearances from the key distances", () => {
    const layout = solve(defaultConfig());
    expect(layout.fingerKeyClearance.x).toBeCloseTo(10.025, 12);
    expect(layout.fingerKeyClearance.y).toBeCloseTo(10.025, 12);
    expect(layout.thumbKeyClearance.x).toBeCloseTo(10.025, 12);
    expect(layout.thumbKeyClearance.y).toBeCloseTo(14.7875, 12);
  });

  it("handles a single row and a single thumb key without NaN", () => {
    const config = defaultConfig();
    config.fingerCluster.rows = 1;
    config.fingerCluster.homeRowIndex = 0;
    config.thumbCluster.keys = 1;
    config.thumbCluster.restingKeyIndex = 0;
    const layout = solve(config);
    expect(layout.columns.every((column) => column.keys.length === 1)).toBe(true);
    expect(layout.thumbKeys).toHaveLength(1);
    expect(allKeys(layout).every(isFiniteTransform)).toBe(true);
  });

  it("property: every valid parametrization yields finite transforms", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 5 }),
        fc.integer({ min: 1, max: 6 }),
        fc.double({ min: -20, max: 50, noNaN: true }),
        fc.double({ min: 0, max: 60, noNaN: true }),
        fc.double({ min: -20, max: 50, noNaN: true }),
        (rows, thumbKeys, curvature, sideAngle, thumbCurvature) => {
          const config = defaultConfig();
          config.fingerCluster.rows = rows;
          config.fingerCluster.homeRowIndex = rows - 1;
          config.fingerCluster.columns = [
            { kind: "side", sideAngle },
            { kind: "normal", curvatureAngle: curvature, offset: { y: 0, z: 0 } },
            { kind: "side", sideAngle }
          ];
          config.thumbCluster.keys = thumbKeys;
          config.thumbCluster.restingKeyIndex = 0;
          config.thumbCluster.curvatureAngle = thumbCurvature;
          const layout = solve(config);
          return allKeys(layout).every(isFiniteTransform);
        }
      ),
      { numRuns: 60 }
    );
  });
});

describe("edge columns", () => {
  for (let count = 2; count <= 6; count++) {
    it(`take the curvature of their neighbor with ${count} columns`, () => {
      const config = defaultConfig();
      config.fingerCluster.columns = columnsWithSides(count, (i) => 10 + 5 * i);
      const layout = solve(config);
      const first = layout.columns[0];
      const last = layout.columns[count - 1];

      expect(first.kind).toBe("side");
      expect(first.curvatureSource).toBe(1);
      expect(first.curvatureAngle).toBe(layout.columns[1].curvatureAngle);
      expect(angleBetween(first.keys[0], first.keys[1])).toBeCloseTo(layout.columns[1].curvatureAngle, 9);

      if (last.kind === "side") {
        expect(last.curvatureSource).toBe(count - 2);
        expect(last.curvatureAngle).toBe(layout.columns[count - 2].curvatureAngle);
        expect(angleBetween(last.keys[1], last.keys[2])).toBeCloseTo(layout.columns[count - 2].curvatureAngle, 9);
      }
    });
  }
});

describe("placeColumns", () => {
  it("keeps the home row of interior columns on a straight line along X", () => {
    const config = defaultConfig();
    config.fingerCluster.columns = config.fingerCluster.columns.map((column) =>
      column.kind === "normal" ? { ...column, offset: { y: 0, z: 0 } } : column
    );
    const columns = placeColumns(config.fingerCluster);
    const home = columns.filter((column) => column.kind === "normal").map((column) => column.keys[1]);

    expect(home).toHaveLength(4);
    home.forEach((key, i) => {
      const p = position(key);
      expect(p.x).toBeCloseTo(config.fingerCluster.keyDistance.x * (i + 1), 12);
      expect(p.y).toBeCloseTo(0, 12);
      expect(p.z).toBeCloseTo(0, 12);
      expect(zAxis(key).z).toBeCloseTo(1, 12);
    });
  });

  it("puts the home row key of a normal column at the column offset", () => {
    const config = defaultConfig();
    const columns = placeColumns(config.fingerCluster);
    const p = position(columns[4].keys[1]);
    expect(p.x).toBeCloseTo(19.05 * 4, 12);
    expect(p.y).toBeCloseTo(-20, 12);
    expect(p.z).toBeCloseTo(5, 12);
  });

  it("raises keys away from the home row on the curvature arc", () => {
    const config = defaultConfig();
    const key = placeColumns(config.fingerCluster)[1].keys[2];
    const radius = 19.05 / 2 / Math.tan((10 * Math.PI) / 180) + 6.6;
    const angle = (20 * Math.PI) / 180;
    const p = position(key);
    expect(p.y).toBeCloseTo(radius * Math.sin(angle), 9);
    expect(p.z).toBeCloseTo(radius * (1 - Math.cos(angle)), 9);
  });
});

describe("placeThumbKeys", () => {
  it("anchors the resting key at the cluster transform", () => {
    const config = defaultConfig();
    const keys = placeThumbKeys(config.thumbCluster);
    const cluster = thumbClusterTransform(config.thumbCluster);
    keys[1].elements.forEach((value, i) => expect(value).toBeCloseTo(cluster.elements[i], 12));
  });

  it("spaces keys by the chord of the thumb arc", () => {
    const config = defaultConfig();
    const keys = placeThumbKeys(config.thumbCluster);
    const half = (15 * Math.PI) / 180 / 2;
    const radius = 19.05 / 2 / Math.tan(half) + 6.6;
    const a = position(keys[0]);
    const b = position(keys[1]);
    expect(Math.hypot(a.x - b.x, a.y - b.y, a.z - b.z)).toBeCloseTo(2 * radius * Math.sin(half), 9);
  });
});

describe("convexHull", () => {
  it("drops interior points and returns counter-clockwise order", () => {
    const hull = convexHull([
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 1, y: 1 },
      { x: 2, y: 2 },
      { x: 0, y: 2 }
    ]);
    expect(hull).toEqual([
      { x: 0, y: 0 },
      { x: 2, y: 0 },
      { x: 2, y: 2 },
      { x: 0, y: 2 }
    ]);
  });
});
