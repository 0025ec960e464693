import type { ImplicitSolid } from "@keyshell/sdf";
import type { SampleGrid } from "./types.js";

export interface SampleTask {
  kind: "sample";
  solidId: number;
  grid: SampleGrid;
  zStart: number;
  zEnd: number;
}

export interface NormalsTask {
  kind: "normals";
  solidId: number;
  positions: Float32Array;
  probe: number;
}

export type MesherTask = SampleTask | NormalsTask;

/** What a worker receives: the task, plus the solid the first time the worker sees it. */
export type MesherMessage = MesherTask & { solid?: ImplicitSolid };

export type MesherResult = { kind: "sample"; values: Float32Array } | { kind: "normals"; normals: Float32Array };

export type WorkerReply = { ok: true; result: MesherResult } | { ok: false; error: string };
