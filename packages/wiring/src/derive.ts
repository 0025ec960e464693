import { scale, sub, withPosition, yAxis, type RigidTransform, type Vec2 } from "@keyshell/core";
import type { LayoutResult } from "@keyshell/layout";
import { CONNECTOR_WIDTH, FPC_PAD_OFFSET, PAD_SIZE } from "./constants.js";
import { clusterConnector, columnConnector, columnKeyConnector, padCenter, sideKeyConnector } from "./connectors.js";
import type { BoardAnchor, ColumnConnector, KeyConnector, KeyId, WiredKey, WiringLayout } from "./types.js";

export function fingerKeyId(column: number, row: number): KeyId {
  return `finger:c${column}r${row}`;
}

export function thumbKeyId(index: number): KeyId {
  return `thumb:${index}`;
}

function anchorAt(point: Vec2, origin: Vec2): BoardAnchor {
  return { x: point.x - origin.x, y: point.y - origin.y, angle: 0 };
}

/** Distance between the pads of two keys joined by a key connector, laid flat. */
function keyStep(connector: KeyConnector): Vec2 {
  return { x: connector.lateral, y: connector.segment.length + PAD_SIZE.y };
}

function thumbStep(connector: KeyConnector): Vec2 {
  return { x: connector.segment.length + PAD_SIZE.x, y: connector.lateral };
}

/**
 * Distance between neighbouring home row pads, laid flat. A curved connector
 * leaves the left pad on its `arcSide` edge, bends down the curve and enters
 * the right pad on the opposite edge.
 */
function columnStep(connector: ColumnConnector): Vec2 {
  if (connector.kind === "side") {
    return { x: connector.segment.length + PAD_SIZE.x, y: connector.lateral };
  }
  const { arcRadius, arcSide, curve } = connector;
  return {
    x: 2 * arcRadius + PAD_SIZE.x,
    y: -arcSide * (2 * arcRadius + curve.length - PAD_SIZE.y + CONNECTOR_WIDTH)
  };
}

/** Pad positions of one column, walking the key connectors up and down from the home row. */
function flattenColumn(home: Vec2, strips: readonly KeyConnector[], homeRow: number): Vec2[] {
  const points: Vec2[] = Array.from({ length: strips.length + 1 }, () => home);
  for (let row = homeRow + 1; row <= strips.length; row++) {
    const step = keyStep(strips[row - 1]);
    points[row] = { x: points[row - 1].x + step.x, y: points[row - 1].y + step.y };
  }
  for (let row = homeRow - 1; row >= 0; row--) {
    const step = keyStep(strips[row]);
    points[row] = { x: points[row + 1].x - step.x, y: points[row + 1].y - step.y };
  }
  return points;
}

/**
 * Derives the switch matrix and the flexible board shape from a solved
 * layout. Finger rows get their own row nets, the thumb arc shares one
 * extra row. Column nets are shared by finger column `c` and thumb key `c`.
 *
 * Board anchors place every pad on the board laid flat: the home rows follow
 * the column connectors, each column follows its key connectors, and the
 * thumb arc hangs off the cluster connector below the first key of the first
 * normal column, which sits at the origin.
 */
export function deriveWiring(layout: LayoutResult): WiringLayout {
  const anchorColumn = layout.columns.find((column) => column.kind === "normal");
  if (!anchorColumn) {
    throw new Error("Layout has no normal column; config was not validated");
  }
  const anchorKey = anchorColumn.keys[0];
  const referenceKey = fingerKeyId(anchorColumn.index, 0);

  const thumbRow = layout.rows;
  const rowNets = Array.from({ length: layout.rows + 1 }, (_, row) => `ROW${row + 1}`);
  const columnNets = Array.from(
    { length: Math.max(layout.columns.length, layout.thumbKeys.length) },
    (_, column) => `COL${column + 1}`
  );

  const columnStrips: KeyConnector[][] = layout.columns.map((column) => {
    const strips: KeyConnector[] = [];
    for (let row = 1; row < column.keys.length; row++) {
      strips.push(
        columnKeyConnector(
          fingerKeyId(column.index, row - 1),
          column.keys[row - 1],
          fingerKeyId(column.index, row),
          column.keys[row]
        )
      );
    }
    return strips;
  });
  const thumbStrips: KeyConnector[] = [];
  for (let index = 1; index < layout.thumbKeys.length; index++) {
    thumbStrips.push(
      sideKeyConnector(thumbKeyId(index - 1), layout.thumbKeys[index - 1], thumbKeyId(index), layout.thumbKeys[index])
    );
  }

  const home = layout.homeRowIndex;
  const columnConnectors: ColumnConnector[] = [];
  for (let c = 1; c < layout.columns.length; c++) {
    const left = layout.columns[c - 1];
    const right = layout.columns[c];
    columnConnectors.push(
      columnConnector(
        fingerKeyId(left.index, home),
        left.keys[home],
        fingerKeyId(right.index, home),
        right.keys[home],
        left.kind === "normal" && right.kind === "normal"
      )
    );
  }
  const clusterStrip = clusterConnector(referenceKey, anchorKey, thumbKeyId(0), layout.thumbKeys[0]);

  let homePoint: Vec2 = { x: 0, y: 0 };
  const fingerPoints = columnStrips.map((strips, c) => {
    if (c > 0) {
      const step = columnStep(columnConnectors[c - 1]);
      homePoint = { x: homePoint.x + step.x, y: homePoint.y + step.y };
    }
    return flattenColumn(homePoint, strips, home);
  });
  const origin = fingerPoints[anchorColumn.index][0];
  const thumbPoints: Vec2[] = [{ x: origin.x, y: origin.y - PAD_SIZE.y - clusterStrip.curve.length }];
  for (const strip of thumbStrips) {
    const last = thumbPoints[thumbPoints.length - 1];
    const step = thumbStep(strip);
    thumbPoints.push({ x: last.x + step.x, y: last.y + step.y });
  }

  const wire = (
    id: KeyId,
    cluster: WiredKey["cluster"],
    column: number,
    row: number,
    key: RigidTransform,
    point: Vec2
  ): WiredKey => ({
    id,
    cluster,
    column,
    row,
    rowNet: rowNets[cluster === "thumb" ? thumbRow : row],
    columnNet: columnNets[column],
    padCenter: padCenter(key),
    anchor: anchorAt(point, origin)
  });

  const keys: WiredKey[] = [
    ...layout.columns.flatMap((column) =>
      column.keys.map((key, row) =>
        wire(fingerKeyId(column.index, row), "finger", column.index, row, key, fingerPoints[column.index][row])
      )
    ),
    ...layout.thumbKeys.map((key, index) => wire(thumbKeyId(index), "thumb", index, 0, key, thumbPoints[index]))
  ];

  const fpcPosition = withPosition(anchorKey, sub(padCenter(anchorKey), scale(yAxis(anchorKey), FPC_PAD_OFFSET)));

  return {
    referenceKey,
    keys,
    rowNets,
    columnNets,
    keyConnectors: [...columnStrips.flat(), ...thumbStrips],
    columnConnectors,
    clusterConnector: clusterStrip,
    fpcPad: {
      position: fpcPosition,
      anchor: { x: 0, y: -FPC_PAD_OFFSET, angle: 0 }
    }
  };
}
