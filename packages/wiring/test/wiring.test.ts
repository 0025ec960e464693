import { describe, expect, it } from "vitest";
import { add, position, scale, sub, xAxis, yAxis } from "@keyshell/core";
import { defaultConfig, type Config } from "@keyshell/config";
import { solveLayout, type LayoutResult } from "@keyshell/layout";
import { deriveWiring, padCenter, type BoardAnchor, type WiringLayout } from "../src/index.js";

function solve(config: Config): LayoutResult {
  const result = solveLayout(config);
  if (!result.ok) throw result.error;
  return result.value;
}

function wiring(config: Config = defaultConfig()): WiringLayout {
  return deriveWiring(solve(config));
}

function anchorOf(layout: WiringLayout, id: string): BoardAnchor {
  const key = layout.keys.find((entry) => entry.id === id);
  if (!key) throw new Error(`No key ${id}`);
  return key.anchor;
}

function flatConfig(): Config {
  const config = defaultConfig();
  for (const column of config.fingerCluster.columns) {
    if (column.kind === "normal") column.curvatureAngle = 0;
  }
  config.thumbCluster.curvatureAngle = 0;
  return config;
}

describe("deriveWiring", () => {
  const layout = solve(defaultConfig());
  const result = deriveWiring(layout);

  it("wires every key exactly once", () => {
    const ids = result.keys.map((key) => key.id);
    expect(ids).toHaveLength(21);
    expect(new Set(ids).size).toBe(21);
    expect(ids[0]).toBe("finger:c0r0");
    expect(ids.slice(18)).toEqual(["thumb:0", "thumb:1", "thumb:2"]);
  });

  it("gives the thumb keys a row net of their own", () => {
    expect(result.rowNets).toEqual(["ROW1", "ROW2", "ROW3", "ROW4"]);
    expect(result.columnNets).toEqual(["COL1", "COL2", "COL3", "COL4", "COL5", "COL6"]);

    const fingerRows = new Set(result.keys.filter((key) => key.cluster === "finger").map((key) => key.rowNet));
    const thumbRows = new Set(result.keys.filter((key) => key.cluster === "thumb").map((key) => key.rowNet));
    expect([...fingerRows].sort()).toEqual(["ROW1", "ROW2", "ROW3"]);
    expect([...thumbRows]).toEqual(["ROW4"]);
    expect(result.keys.filter((key) => key.cluster === "thumb").map((key) => key.columnNet)).toEqual([
      "COL1",
      "COL2",
      "COL3"
    ]);
  });

  it("never puts two keys on the same row and column net", () => {
    const pairs = result.keys.map((key) => `${key.rowNet}/${key.columnNet}`);
    expect(new Set(pairs).size).toBe(pairs.length);
  });

  it("measures board anchors from the first key of the first normal column", () => {
    expect(result.referenceKey).toBe("finger:c1r0");
    const reference = result.keys.find((key) => key.id === result.referenceKey);
    expect(reference?.anchor.x).toBeCloseTo(0, 9);
    expect(reference?.anchor.y).toBeCloseTo(0, 9);
    expect(reference?.anchor.angle).toBeCloseTo(0, 9);

    expect(result.fpcPad.anchor.x).toBeCloseTo(0, 9);
    expect(result.fpcPad.anchor.y).toBeCloseTo(-7.9, 9);
  });

  it("lays neighbouring pads of a column one strip and one pad apart", () => {
    for (const connector of result.keyConnectors.slice(0, 12)) {
      const from = anchorOf(result, connector.from);
      const to = anchorOf(result, connector.to);
      expect(to.y - from.y).toBeCloseTo(connector.segment.length + 14, 9);
      expect(to.x - from.x).toBeCloseTo(connector.lateral, 9);
      expect(to.angle).toBe(0);
    }
  });

  it("lays neighbouring thumb pads one strip and one pad apart", () => {
    for (const connector of result.keyConnectors.slice(12)) {
      const from = anchorOf(result, connector.from);
      const to = anchorOf(result, connector.to);
      expect(to.x - from.x).toBeCloseTo(connector.segment.length + 13, 9);
      expect(to.y - from.y).toBeCloseTo(connector.lateral, 9);
    }
  });

  it("steps home rows along the column connectors", () => {
    for (const connector of result.columnConnectors) {
      const from = anchorOf(result, connector.from);
      const to = anchorOf(result, connector.to);
      if (connector.kind === "side") {
        expect(to.x - from.x).toBeCloseTo(connector.segment.length + 13, 9);
        expect(to.y - from.y).toBeCloseTo(connector.lateral, 9);
      } else {
        const { arcRadius, arcSide, curve } = connector;
        expect(to.x - from.x).toBeCloseTo(2 * arcRadius + 13, 9);
        expect(to.y - from.y).toBeCloseTo(-arcSide * (2 * arcRadius + curve.length - 12), 9);
      }
    }
  });

  it("hangs the first thumb pad below the reference pad along the cluster connector", () => {
    const first = anchorOf(result, "thumb:0");
    expect(first.x).toBeCloseTo(0, 9);
    expect(first.y).toBeCloseTo(-(14 + result.clusterConnector.curve.length), 9);
  });

  it("places pads below the switch plate", () => {
    const key = layout.columns[2].keys[1];
    const wired = result.keys.find((entry) => entry.id === "finger:c2r1");
    expect(wired?.padCenter).toEqual(padCenter(key));
  });

  it("connects neighbouring keys of columns and the thumb arc", () => {
    expect(result.keyConnectors).toHaveLength(6 * 2 + 2);
    expect(result.keyConnectors[0]).toMatchObject({ from: "finger:c0r0", to: "finger:c0r1" });
    expect(result.keyConnectors[12]).toMatchObject({ from: "thumb:0", to: "thumb:1" });

    for (const connector of result.keyConnectors.slice(0, 12)) {
      expect(connector.segment.kind).toBe("arc");
      if (connector.segment.kind === "arc") {
        expect(connector.segment.angle).toBeGreaterThan(0);
      }
    }
  });

  it("joins the home row keys of neighbouring columns", () => {
    expect(result.columnConnectors.map((connector) => connector.kind)).toEqual([
      "side",
      "normal",
      "normal",
      "normal",
      "side"
    ]);

    const sunken = result.columnConnectors[1];
    expect(sunken).toMatchObject({ from: "finger:c1r1", to: "finger:c2r1", arcSide: -1 });
    if (sunken.kind !== "normal") return;
    expect(sunken.arcRadius).toBeCloseTo((19.05 - 13) / 2, 9);
    expect(result.columnConnectors[2]).toMatchObject({ arcSide: 1 });

    const left = layout.columns[1].keys[1];
    const start = add(add(padCenter(left), scale(xAxis(left), 6.5 + sunken.arcRadius)), scale(yAxis(left), -(6 - sunken.arcRadius)));
    expect(sunken.curve.points).toHaveLength(51);
    expect(sunken.curve.points[0].x).toBeCloseTo(start.x, 9);
    expect(sunken.curve.points[0].y).toBeCloseTo(start.y, 9);
    expect(sunken.curve.points[0].z).toBeCloseTo(start.z, 9);

    const chord = sub(sunken.curve.points[50], sunken.curve.points[0]);
    expect(sunken.curve.length).toBeGreaterThanOrEqual(Math.hypot(chord.x, chord.y, chord.z));
  });

  it("runs the cluster connector from the reference key to the first thumb key", () => {
    const { clusterConnector } = result;
    expect(clusterConnector).toMatchObject({ from: "finger:c1r0", to: "thumb:0" });
    const anchor = layout.columns[1].keys[0];
    const first = clusterConnector.curve.points[0];
    const expected = sub(padCenter(anchor), scale(yAxis(anchor), 7));
    expect(first.x).toBeCloseTo(expected.x, 9);
    expect(first.y).toBeCloseTo(expected.y, 9);
    expect(first.z).toBeCloseTo(expected.z, 9);
    expect(Number.isFinite(clusterConnector.curve.length)).toBe(true);
  });

  it("is deterministic", () => {
    expect(wiring()).toEqual(result);
  });
});

describe("deriveWiring on flat clusters", () => {
  const result = wiring(flatConfig());

  it("lays straight strips between keys", () => {
    const columns = result.keyConnectors.slice(0, 12);
    const thumbs = result.keyConnectors.slice(12);
    for (const connector of columns) {
      expect(connector.segment.kind).toBe("line");
      expect(connector.segment.length).toBeCloseTo(19.05 - 14, 9);
    }
    for (const connector of thumbs) {
      expect(connector.segment.kind).toBe("line");
      expect(connector.segment.length).toBeCloseTo(19.05 - 13, 9);
    }
  });

  it("stacks column pads a key distance apart", () => {
    for (const row of [0, 1, 2]) {
      const anchor = anchorOf(result, `finger:c1r${row}`);
      expect(anchor.x).toBeCloseTo(0, 9);
      expect(anchor.y).toBeCloseTo(19.05 * row, 9);
    }
    const first = anchorOf(result, "thumb:0");
    const second = anchorOf(result, "thumb:1");
    expect(second.x - first.x).toBeCloseTo(19.05, 9);
    expect(second.y - first.y).toBeCloseTo(0, 9);
  });

  it("starts thumb strips at the right pad edge, running along the key's X axis", () => {
    const layout = solve(flatConfig());
    const key = layout.thumbKeys[0];
    const { start } = result.keyConnectors[12];
    const expected = add(padCenter(key), scale(xAxis(key), 6.5));
    const direction = yAxis(start);
    const along = xAxis(key);

    expect(position(start).x).toBeCloseTo(expected.x, 9);
    expect(position(start).y).toBeCloseTo(expected.y, 9);
    expect(position(start).z).toBeCloseTo(expected.z, 9);
    expect(direction.x).toBeCloseTo(along.x, 9);
    expect(direction.y).toBeCloseTo(along.y, 9);
    expect(direction.z).toBeCloseTo(along.z, 9);
  });
});

describe("deriveWiring on a minimal layout", () => {
  it("stays finite with a single row and a single thumb key", () => {
    const config = defaultConfig();
    config.fingerCluster.rows = 1;
    config.fingerCluster.homeRowIndex = 0;
    config.thumbCluster.keys = 1;
    config.thumbCluster.restingKeyIndex = 0;
    const result = wiring(config);

    expect(result.keys).toHaveLength(7);
    expect(result.keyConnectors).toEqual([]);
    expect(result.rowNets).toEqual(["ROW1", "ROW2"]);
    expect(result.columnConnectors).toHaveLength(5);

    const numbers = [
      ...result.keys.flatMap((key) => [key.anchor.x, key.anchor.y, key.anchor.angle]),
      ...result.clusterConnector.curve.points.flatMap((p) => [p.x, p.y, p.z]),
      ...result.columnConnectors.map((connector) =>
        connector.kind === "normal" ? connector.curve.length : connector.segment.length
      )
    ];
    expect(numbers.every(Number.isFinite)).toBe(true);
  });
});
