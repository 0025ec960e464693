import {
  boundsFromOutline,
  compose,
  err,
  ok,
  position,
  rotationX,
  rotationY,
  toRadians,
  translation,
  unionBounds,
  type Result,
  type RigidTransform
} from "@keyshell/core";
import { validateConfig, type Config, type ConfigError } from "@keyshell/config";
import { fingerKeyClearance, placeColumns } from "./columns.js";
import { CENTER_OFFSET, Z_OFFSET } from "./constants.js";
import { keyCorners } from "./outline.js";
import { placeThumbKeys, thumbClusterTransform, thumbKeyClearance } from "./thumb-keys.js";
import type { LayoutResult } from "./types.js";

function minZ(keys: RigidTransform[]): number {
  return keys.reduce((min, key) => Math.min(min, position(key).z), Number.POSITIVE_INFINITY);
}

/**
 * Solves every key transform of one keyboard half. The config is validated
 * first; a valid config always yields a layout.
 */
export function solveLayout(input: Config): Result<LayoutResult, ConfigError> {
  const validated = validateConfig(input);
  if (!validated.ok) {
    return err(validated.error);
  }
  const config = validated.value;
  const { fingerCluster, thumbCluster, keyboard } = config;

  const columns = placeColumns(fingerCluster);
  const thumbKeys = placeThumbKeys(thumbCluster);
  const fingerClearance = fingerKeyClearance(fingerCluster.keyDistance);
  const thumbClearance = thumbKeyClearance(thumbCluster.keyDistance);

  const tilt = compose(
    rotationY(toRadians(keyboard.tiltingAngle.y)),
    rotationX(toRadians(keyboard.tiltingAngle.x))
  );
  const tiltedFinger = columns.flatMap((column) => column.keys).map((key) => compose(tilt, key));
  const tiltedThumb = thumbKeys.map((key) => compose(tilt, key));

  const lowest = Math.min(minZ(tiltedFinger), minZ(tiltedThumb));
  const footprint = unionBounds(
    boundsFromOutline(keyCorners(tiltedFinger, fingerClearance), 0, 0, keyboard.circumferenceDistance),
    boundsFromOutline(keyCorners(tiltedThumb, thumbClearance), 0, 0, keyboard.circumferenceDistance)
  );
  const placement = compose(translation(CENTER_OFFSET - footprint.minX, 0, Z_OFFSET - lowest), tilt);

  return ok({
    rows: fingerCluster.rows,
    homeRowIndex: fingerCluster.homeRowIndex,
    restingKeyIndex: thumbCluster.restingKeyIndex,
    columns: columns.map((column) => ({
      ...column,
      keys: column.keys.map((key) => compose(placement, key))
    })),
    thumbKeys: thumbKeys.map((key) => compose(placement, key)),
    fingerKeyClearance: fingerClearance,
    thumbKeyClearance: thumbClearance,
    thumbClusterTransform: thumbClusterTransform(thumbCluster),
    placement
  });
}

/** Every finger key in column-major order, then every thumb key. */
export function allKeys(layout: LayoutResult): RigidTransform[] {
  return [...layout.columns.flatMap((column) => column.keys), ...layout.thumbKeys];
}
