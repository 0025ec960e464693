import { compose, rotationX, rotationY, toRadians, translation, type RigidTransform, type Vec2 } from "@keyshell/core";
import type { ColumnSpec, FingerClusterConfig, NormalColumnSpec } from "@keyshell/config";
import { CURVATURE_HEIGHT, KEY_CLEARANCE } from "./constants.js";
import type { ColumnLayout } from "./types.js";

interface ResolvedColumn {
  curvatureAngle: number;
  offset: NormalColumnSpec["offset"];
  sideAngle: number;
  /** +1 for a left edge column, -1 for a right one, 0 otherwise. */
  side: number;
  source: number;
}

function resolveColumn(columns: ColumnSpec[], index: number): ResolvedColumn {
  const column = columns[index];
  if (column.kind === "normal") {
    return { curvatureAngle: column.curvatureAngle, offset: column.offset, sideAngle: 0, side: 0, source: index };
  }

  const [side, source] = index === 0 ? [1, 1] : [-1, columns.length - 2];
  const donor = columns[source];
  if (!donor || donor.kind !== "normal") {
    throw new Error(`Side column ${index} has no normal neighbor; config was not validated`);
  }
  return {
    curvatureAngle: donor.curvatureAngle,
    offset: donor.offset,
    sideAngle: column.sideAngle,
    side,
    source
  };
}

function columnKeys(resolved: ResolvedColumn, index: number, config: FingerClusterConfig): RigidTransform[] {
  const { keyDistance, rows, homeRowIndex } = config;
  const sideAngle = toRadians(resolved.sideAngle);
  const { side } = resolved;

  let x = keyDistance.x * index;
  let zOffset = 0;
  if (sideAngle !== 0) {
    const sideRadius = keyDistance.x / 2 / Math.tan(sideAngle / 2) + CURVATURE_HEIGHT;
    x = keyDistance.x * (index + side) - side * sideRadius * Math.sin(sideAngle);
    zOffset = sideRadius * (1 - Math.cos(sideAngle));
  }

  const columnTransform = compose(
    translation(x, resolved.offset.y, resolved.offset.z + zOffset),
    rotationY(side * sideAngle)
  );

  const curvatureAngle = toRadians(resolved.curvatureAngle);
  const keys: RigidTransform[] = [];

  if (curvatureAngle === 0) {
    for (let row = 0; row < rows; row++) {
      keys.push(compose(columnTransform, translation(0, keyDistance.y * (row - homeRowIndex), 0)));
    }
    return keys;
  }

  const keycapRadius = keyDistance.y / 2 / Math.tan(curvatureAngle / 2);
  const curvatureRadius = keycapRadius + CURVATURE_HEIGHT;
  const sideTan = Math.tan(sideAngle);

  for (let row = 0; row < rows; row++) {
    const totalAngle = curvatureAngle * (row - homeRowIndex);
    const sin = Math.sin(totalAngle);
    const rcos = 1 - Math.cos(totalAngle);

    // Edge columns lean sideways, so keys further up the arc drift towards the neighbor
    const x = -side * sideTan * (keycapRadius * rcos + Math.sign(sideAngle) * (keyDistance.y / 2) * Math.abs(sin));
    const y = curvatureRadius * sin;
    const z = curvatureRadius * rcos;

    keys.push(compose(columnTransform, translation(x, y, z), rotationX(totalAngle)));
  }
  return keys;
}

/** Finger key transforms before tilting and placement. */
export function placeColumns(config: FingerClusterConfig): ColumnLayout[] {
  return config.columns.map((column, index) => {
    const resolved = resolveColumn(config.columns, index);
    return {
      index,
      kind: column.kind,
      curvatureAngle: resolved.curvatureAngle,
      sideAngle: resolved.sideAngle,
      curvatureSource: resolved.source,
      keys: columnKeys(resolved, index, config)
    };
  });
}

export function fingerKeyClearance(keyDistance: Vec2): Vec2 {
  return {
    x: (keyDistance.x + KEY_CLEARANCE) / 2,
    y: (keyDistance.y + KEY_CLEARANCE) / 2
  };
}
