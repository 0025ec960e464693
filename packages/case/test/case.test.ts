import { describe, expect, it } from "vitest";
import { add, position, scale, zAxis, type Vec2, type Vec3 } from "@keyshell/core";
import { defaultConfig, type Config } from "@keyshell/config";
import { solveLayout, type LayoutResult } from "@keyshell/layout";
import { evaluate } from "@keyshell/sdf";
import {
  buildCase,
  extremeVertex,
  INTERFACE,
  outwardBisector,
  placeInsertHolders,
  portFrame,
  type CaseSolids
} from "../src/index.js";

function solve(config: Config): LayoutResult {
  const result = solveLayout(config);
  if (!result.ok) throw result.error;
  return result.value;
}

function build(config: Config = defaultConfig()): CaseSolids {
  const result = buildCase(solve(config), config);
  if (!result.ok) throw result.error;
  return result.value;
}

function centroid(points: Vec2[]): Vec2 {
  const sum = points.reduce((acc, p) => ({ x: acc.x + p.x, y: acc.y + p.y }), { x: 0, y: 0 });
  return { x: sum.x / points.length, y: sum.y / points.length };
}

function mirrored(p: Vec3): Vec3 {
  return { x: -p.x, y: p.y, z: p.z };
}

describe("buildCase", () => {
  const config = defaultConfig();
  const { circumferenceDistance, shellThickness, bottomPlateThickness } = config.keyboard;
  const solids = build(config);

  it("shares one node arena between every part", () => {
    expect(solids.leftHalf.nodes).toBe(solids.rightHalf.nodes);
    expect(solids.bottomPlate.nodes).toBe(solids.rightHalf.nodes);
  });

  it("mirrors the bounds of the left half", () => {
    expect(solids.leftHalf.bounds.minX).toBe(-solids.rightHalf.bounds.maxX);
    expect(solids.leftHalf.bounds.maxX).toBe(-solids.rightHalf.bounds.minX);
    expect(solids.rightHalf.bounds.minZ).toBe(0);
    expect(solids.bottomPlate.bounds.maxZ).toBeGreaterThan(0);
  });

  it("places four insert holders on the default layout", () => {
    expect(solids.insertHolders).toHaveLength(4);
  });

  it("keeps the wall solid near an outline corner", () => {
    const outline = solids.outlines.finger;
    const i = extremeVertex(outline, { x: 1, y: -1 });
    const outward = outwardBisector(outline, i);
    const d = circumferenceDistance - shellThickness / 2;
    const wall = { x: outline[i].x + d * outward.x, y: outline[i].y + d * outward.y, z: 0.5 };

    expect(evaluate(solids.rightHalf, wall)).toBeLessThan(0);
    expect(evaluate(solids.leftHalf, mirrored(wall))).toBe(evaluate(solids.rightHalf, wall));
  });

  it("is hollow inside and empty below the floor", () => {
    const center = centroid(solids.outlines.finger);
    expect(evaluate(solids.rightHalf, { x: center.x, y: center.y, z: 1 })).toBeGreaterThan(0);
    expect(evaluate(solids.rightHalf, { x: center.x, y: center.y, z: -1 })).toBeGreaterThan(0);
  });

  it("opens the switch cutout and the space above every key", () => {
    const layout = solve(config);
    for (const key of layout.columns.flatMap((column) => column.keys)) {
      expect(evaluate(solids.rightHalf, position(key))).toBeGreaterThan(0);
      expect(evaluate(solids.rightHalf, add(position(key), scale(zAxis(key), 8)))).toBeGreaterThan(0);
    }
  });

  it("cuts the USB port into the left half and the jack into both", () => {
    const frame = portFrame(solids.outlines.finger);
    expect(frame).toBeDefined();
    if (!frame) return;

    const at = (offset: number, height: number): Vec3 =>
      add(
        add(add(frame.origin, scale(frame.along, offset)), scale(frame.outward, circumferenceDistance / 2)),
        { x: 0, y: 0, z: INTERFACE.holderThickness + INTERFACE.pcbThickness + height }
      );

    expect(evaluate(solids.leftHalf, mirrored(at(INTERFACE.usb.offset, INTERFACE.usb.z)))).toBeGreaterThan(0);
    expect(evaluate(solids.leftHalf, mirrored(at(INTERFACE.jack.offsetLeft, INTERFACE.jack.z)))).toBeGreaterThan(0);
    expect(evaluate(solids.rightHalf, at(INTERFACE.jack.offsetRight, INTERFACE.jack.z))).toBeGreaterThan(0);
  });

  it("drills the bottom plate at every insert", () => {
    const middle = -bottomPlateThickness / 2;
    for (const holder of solids.insertHolders) {
      expect(evaluate(solids.bottomPlate, { x: holder.center.x, y: holder.center.y, z: middle })).toBeGreaterThan(0);
    }
    const center = centroid(solids.outlines.finger);
    expect(evaluate(solids.bottomPlate, { x: center.x, y: center.y, z: middle })).toBeCloseTo(-bottomPlateThickness / 2);
  });

  it("is deterministic", () => {
    const again = build(config);
    expect(again.rightHalf.nodes).toEqual(solids.rightHalf.nodes);
    expect(again.rightHalf.root).toBe(solids.rightHalf.root);
  });

  it("rejects an invalid keyboard section", () => {
    const broken = defaultConfig();
    broken.keyboard.shellThickness = -1;
    const result = buildCase(solve(defaultConfig()), broken);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues.map((issue) => issue.path)).toEqual(["keyboard.shellThickness"]);
  });
});

describe("placeInsertHolders", () => {
  const square: Vec2[] = [
    { x: 0, y: 0 },
    { x: 10, y: 0 },
    { x: 10, y: 10 },
    { x: 0, y: 10 }
  ];

  it("insets the insert along the corner bisector", () => {
    const [holder] = placeInsertHolders(square, [{ x: 1, y: -1 }], 7, 1);
    expect(holder.vertex).toEqual({ x: 10, y: 0 });
    expect(holder.outward.x).toBeCloseTo(Math.SQRT1_2);
    expect(holder.outward.y).toBeCloseTo(-Math.SQRT1_2);
    // 7 - 2 - max(2, 1) = 3 along the bisector
    expect(holder.center.x).toBeCloseTo(10 + 3 * Math.SQRT1_2);
    expect(holder.center.y).toBeCloseTo(-3 * Math.SQRT1_2);
  });

  it("places one holder per distinct corner", () => {
    expect(placeInsertHolders(square, [{ x: 1, y: 1 }, { x: 2, y: 1.5 }], 7, 2)).toHaveLength(1);
    expect(placeInsertHolders(square.slice(0, 2), [{ x: 1, y: 1 }], 7, 2)).toEqual([]);
  });
});
