import type { Config, ConfigError } from "@keyshell/config";
import type { CaseSolids } from "@keyshell/case";
import type { LayoutResult } from "@keyshell/layout";
import type { Mesh, MeshError, MesherWorkerPool } from "@keyshell/mesher";
import type { WiringLayout } from "@keyshell/wiring";

export type PartName = "rightHalf" | "leftHalf" | "bottomPlate";

export const PART_NAMES: readonly PartName[] = ["rightHalf", "leftHalf", "bottomPlate"];

/** Everything regenerated from one config and resolution. */
export interface GeneratedKeyboard {
  /** `configHash` of the config plus the resolution used. */
  key: string;
  resolution: number;
  config: Readonly<Config>;
  layout: LayoutResult;
  solids: CaseSolids;
  meshes: Record<PartName, Mesh>;
  wiring: WiringLayout;
}

export type GenerateOutcome =
  | { status: "done"; keyboard: GeneratedKeyboard }
  | { status: "failed"; error: ConfigError | MeshError; part?: PartName }
  | { status: "cancelled" };

export interface GenerateOptions {
  /** Overrides `preview.resolution` of the config. */
  resolution?: number;
  pool?: MesherWorkerPool;
  isCancelled?: () => boolean;
  maxSamples?: number;
  log?: (message: string) => void;
}
