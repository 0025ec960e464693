import { compose, rotationY, rotationZYX, toRadians, translation, type RigidTransform, type Vec2 } from "@keyshell/core";
import type { ThumbClusterConfig } from "@keyshell/config";
import { CURVATURE_HEIGHT, KEY_CLEARANCE } from "./constants.js";

export function thumbClusterTransform(config: ThumbClusterConfig): RigidTransform {
  const { rotation, offset } = config;
  return compose(
    translation(offset.x, offset.y, offset.z),
    rotationZYX(toRadians(rotation.x), toRadians(rotation.y), toRadians(rotation.z))
  );
}

/** Thumb keys along a single arc around the resting key, before tilting and placement. */
export function placeThumbKeys(config: ThumbClusterConfig): RigidTransform[] {
  const cluster = thumbClusterTransform(config);
  const curvatureAngle = toRadians(config.curvatureAngle);
  const keys: RigidTransform[] = [];

  if (curvatureAngle === 0 || config.keys === 1) {
    for (let i = 0; i < config.keys; i++) {
      keys.push(compose(cluster, translation(config.keyDistance * (i - config.restingKeyIndex), 0, 0)));
    }
    return keys;
  }

  const curvatureRadius = config.keyDistance / 2 / Math.tan(curvatureAngle / 2) + CURVATURE_HEIGHT;
  for (let i = 0; i < config.keys; i++) {
    const totalAngle = curvatureAngle * (i - config.restingKeyIndex);
    const x = curvatureRadius * Math.sin(totalAngle);
    const z = curvatureRadius * (1 - Math.cos(totalAngle));
    keys.push(compose(cluster, translation(x, 0, z), rotationY(-totalAngle)));
  }
  return keys;
}

export function thumbKeyClearance(keyDistance: number): Vec2 {
  return {
    x: (keyDistance + KEY_CLEARANCE) / 2,
    y: (1.5 * keyDistance + KEY_CLEARANCE) / 2
  };
}
