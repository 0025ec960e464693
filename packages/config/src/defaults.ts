import type { Config } from "./types.js";

export const LIMITS = {
  rows: { min: 1, max: 5 },
  columns: { min: 2, max: 6 },
  thumbKeys: { min: 1, max: 6 },
  curvatureAngle: { min: -20, max: 50 },
  sideAngle: { min: 0, max: 60 }
} as const;

export const DEFAULT_CONFIG: Config = {
  preview: {
    resolution: 1
  },
  fingerCluster: {
    rows: 3,
    columns: [
      { kind: "side", sideAngle: 15 },
      { kind: "normal", curvatureAngle: 20, offset: { y: 0, z: 0 } },
      { kind: "normal", curvatureAngle: 20, offset: { y: 0, z: -3 } },
      { kind: "normal", curvatureAngle: 20, offset: { y: 0, z: 0 } },
      { kind: "normal", curvatureAngle: 20, offset: { y: -20, z: 5 } },
      { kind: "side", sideAngle: 15 }
    ],
    keyDistance: { x: 19.05, y: 19.05 },
    homeRowIndex: 1
  },
  thumbCluster: {
    keys: 3,
    curvatureAngle: 15,
    rotation: { x: -17, y: -29, z: 18.5 },
    offset: { x: -3.05, y: -48, z: 10 },
    keyDistance: 19.05,
    restingKeyIndex: 1
  },
  keyboard: {
    tiltingAngle: { x: 15, y: 20 },
    circumferenceDistance: 7,
    roundingRadius: 3,
    shellThickness: 2.1,
    bottomPlateThickness: 1.6
  }
};

/** Deep copy so callers can edit without touching the shared default. */
export function defaultConfig(): Config {
  return structuredClone(DEFAULT_CONFIG);
}
