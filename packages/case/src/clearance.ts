import type { RigidTransform, Vec2 } from "@keyshell/core";
import type { LayoutResult } from "@keyshell/layout";
import type { NodeId, SdfBuilder } from "@keyshell/sdf";

/** How far a key volume grows past the clearance rectangle on each side. */
export interface KeyVolumeExtension {
  left: number;
  right: number;
  bottom: number;
  top: number;
}

const NO_EXTENSION: KeyVolumeExtension = { left: 0, right: 0, bottom: 0, top: 0 };

/**
 * Box standing on a key: the clearance rectangle in the key plane, raised by
 * `height` along the key normal.
 */
export function keyVolume(
  builder: SdfBuilder,
  key: RigidTransform,
  clearance: Vec2,
  height: number,
  extension: KeyVolumeExtension = NO_EXTENSION
): NodeId {
  const box = builder.boxBetween(
    { x: -clearance.x - extension.left, y: -clearance.y - extension.bottom, z: 0 },
    { x: clearance.x + extension.right, y: clearance.y + extension.top, z: height }
  );
  return builder.transform(box, key);
}

/**
 * Room above every finger key. Keys on the border of the grid open up
 * outwards so the case top falls away from them.
 */
export function fingerClearance(builder: SdfBuilder, layout: LayoutResult, height: number): NodeId {
  const last = layout.columns.length - 1;
  const volumes = layout.columns.flatMap((column, c) =>
    column.keys.map((key, r) =>
      keyVolume(builder, key, layout.fingerKeyClearance, height, {
        left: c === 0 ? height : 0,
        right: c === last ? height : 0,
        bottom: r === 0 ? height : 0,
        top: r === layout.rows - 1 ? height : 0
      })
    )
  );
  return builder.union(...volumes);
}

/** Room above every thumb key: open towards both sides of the arc and past its ends. */
export function thumbClearance(builder: SdfBuilder, layout: LayoutResult, height: number): NodeId {
  const last = layout.thumbKeys.length - 1;
  const volumes = layout.thumbKeys.map((key, i) =>
    keyVolume(builder, key, layout.thumbKeyClearance, height, {
      left: i === 0 ? height : 0,
      right: i === last ? height : 0,
      bottom: height,
      top: height
    })
  );
  return builder.union(...volumes);
}

/** Plain key volumes without extensions, cut from the neighbouring cluster. */
export function keyClearance(builder: SdfBuilder, keys: RigidTransform[], clearance: Vec2, height: number): NodeId {
  return builder.union(...keys.map((key) => keyVolume(builder, key, clearance, height)));
}
