import {
  boundsFromOutline,
  err,
  expandBounds,
  mirrorBoundsYZ,
  ok,
  position,
  unionBounds,
  type Bounds,
  type Result,
  type RigidTransform,
  type Vec2
} from "@keyshell/core";
import { validateConfig, type Config, type ConfigError } from "@keyshell/config";
import { clusterOutline, type LayoutResult } from "@keyshell/layout";
import { SdfBuilder, type NodeId } from "@keyshell/sdf";
import { fingerClearance, keyClearance, thumbClearance } from "./clearance.js";
import { BOTTOM_PLATE_HOLE_RADIUS, INSERT_HOLDER, SWITCH_CUTOUT } from "./constants.js";
import { FINGER_HOLDER_DIRECTIONS, THUMB_HOLDER_DIRECTIONS, insertHolder, placeInsertHolders } from "./insert-holders.js";
import { portCutouts, portFrame } from "./ports.js";
import type { CaseSolids } from "./types.js";

function maxZ(keys: RigidTransform[]): number {
  return keys.reduce((max, key) => Math.max(max, position(key).z), Number.NEGATIVE_INFINITY);
}

/** Height of a cluster's case top: the highest key plus its clearance radius. */
function clusterHeight(keys: RigidTransform[], clearance: Vec2): number {
  return maxZ(keys) + Math.hypot(clearance.x, clearance.y);
}

/**
 * Builds the implicit solids of both case halves and the bottom plate from a
 * solved layout. The right half is built in layout space; the left half is
 * its mirror image across the YZ plane.
 */
export function buildCase(layout: LayoutResult, input: Config): Result<CaseSolids, ConfigError> {
  const validated = validateConfig(input);
  if (!validated.ok) {
    return err(validated.error);
  }
  const { circumferenceDistance, roundingRadius, shellThickness, bottomPlateThickness } = validated.value.keyboard;

  const fingerKeys = layout.columns.flatMap((column) => column.keys);
  const thumbKeys = layout.thumbKeys;
  const fingerOutline = clusterOutline(fingerKeys, layout.fingerKeyClearance);
  const thumbOutline = clusterOutline(thumbKeys, layout.thumbKeyClearance);
  const fingerHeight = clusterHeight(fingerKeys, layout.fingerKeyClearance);
  const thumbHeight = clusterHeight(thumbKeys, layout.thumbKeyClearance);

  const builder = new SdfBuilder();
  const clearanceHeight = Math.max(fingerHeight, thumbHeight);

  // Cluster bodies reach below the floor so the half space cut leaves the bottom open.
  const fingerBody = builder.prism(fingerOutline, -fingerHeight, fingerHeight, circumferenceDistance);
  const thumbBody = builder.prism(thumbOutline, -thumbHeight, thumbHeight, circumferenceDistance);

  const fingerTop = builder.roundDifference(
    builder.roundDifference(fingerBody, fingerClearance(builder, layout, clearanceHeight), roundingRadius),
    keyClearance(builder, thumbKeys, layout.thumbKeyClearance, clearanceHeight),
    roundingRadius
  );
  const thumbTop = builder.roundDifference(
    builder.roundDifference(thumbBody, thumbClearance(builder, layout, clearanceHeight), roundingRadius),
    keyClearance(builder, fingerKeys, layout.fingerKeyClearance, clearanceHeight),
    roundingRadius
  );

  const floor = builder.halfSpace({ x: 0, y: 0, z: -1 }, 0);
  const hollow = builder.intersection(builder.shell(builder.union(fingerTop, thumbTop), shellThickness), floor);

  const insertHolders = [
    ...placeInsertHolders(fingerOutline, FINGER_HOLDER_DIRECTIONS, circumferenceDistance, shellThickness),
    ...placeInsertHolders(thumbOutline, THUMB_HOLDER_DIRECTIONS, circumferenceDistance, shellThickness)
  ];
  const holderSpace = builder.union(
    builder.prism(fingerOutline, -1, INSERT_HOLDER.height + 1, circumferenceDistance),
    builder.prism(thumbOutline, -1, INSERT_HOLDER.height + 1, circumferenceDistance)
  );
  const holders: NodeId[] = insertHolders.map((placement) =>
    builder.intersection(insertHolder(builder, placement, circumferenceDistance), holderSpace)
  );

  const switches = [...fingerKeys, ...thumbKeys].map((key) => builder.transform(builder.box(SWITCH_CUTOUT), key));
  const cluster = builder.difference(builder.union(hollow, ...holders), ...switches);

  const frame = portFrame(fingerOutline);
  const leftPorts = frame ? portCutouts(builder, frame, "left", circumferenceDistance) : [];
  const rightPorts = frame ? portCutouts(builder, frame, "right", circumferenceDistance) : [];
  const rightRoot = builder.difference(cluster, ...rightPorts);
  const leftRoot = builder.mirrorX(builder.difference(cluster, ...leftPorts));

  const plateOutline = builder.union(
    builder.prism(fingerOutline, -bottomPlateThickness, 0, circumferenceDistance),
    builder.prism(thumbOutline, -bottomPlateThickness, 0, circumferenceDistance)
  );
  const plateHoles = insertHolders.map((placement) =>
    builder.translate(builder.cylinder(BOTTOM_PLATE_HOLE_RADIUS, -bottomPlateThickness - 1, 1), {
      x: placement.center.x,
      y: placement.center.y,
      z: 0
    })
  );
  const plateRoot = builder.difference(plateOutline, ...plateHoles);

  const margin = circumferenceDistance + roundingRadius;
  const bounds: Bounds = unionBounds(
    boundsFromOutline(fingerOutline, 0, fingerHeight, margin),
    boundsFromOutline(thumbOutline, 0, thumbHeight, margin)
  );
  const plateBounds = expandBounds(
    unionBounds(
      boundsFromOutline(fingerOutline, -bottomPlateThickness, 0, circumferenceDistance),
      boundsFromOutline(thumbOutline, -bottomPlateThickness, 0, circumferenceDistance)
    ),
    roundingRadius
  );

  return ok({
    rightHalf: builder.solid(rightRoot, bounds),
    leftHalf: builder.solid(leftRoot, mirrorBoundsYZ(bounds)),
    bottomPlate: builder.solid(plateRoot, plateBounds),
    bounds,
    outlines: { finger: fingerOutline, thumb: thumbOutline },
    insertHolders,
    clusterHeights: { finger: fingerHeight, thumb: thumbHeight }
  });
}
