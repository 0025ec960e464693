import { parentPort } from "node:worker_threads";
import { compileSolid, type SdfFunction } from "@keyshell/sdf";
import { vertexNormals } from "../normals.js";
import type { MesherMessage, MesherResult, WorkerReply } from "../protocol.js";
import { sampleSlab } from "../sample.js";

if (!parentPort) {
  throw new Error("mesher-worker must run in worker context");
}

const MAX_CACHED_SOLIDS = 4;
const compiled = new Map<number, SdfFunction>();

function solidFunction(message: MesherMessage): SdfFunction {
  if (message.solid) {
    compiled.set(message.solidId, compileSolid(message.solid));
    for (const id of compiled.keys()) {
      if (compiled.size <= MAX_CACHED_SOLIDS) break;
      compiled.delete(id);
    }
  }
  const fn = compiled.get(message.solidId);
  if (!fn) {
    throw new Error(`Solid ${message.solidId} was never sent to this worker`);
  }
  return fn;
}

function run(message: MesherMessage): MesherResult {
  const fn = solidFunction(message);
  if (message.kind === "sample") {
    return { kind: "sample", values: sampleSlab(fn, message.grid, message.zStart, message.zEnd) };
  }
  return { kind: "normals", normals: vertexNormals(fn, message.positions, message.probe) };
}

parentPort.on("message", (message: MesherMessage) => {
  try {
    const result = run(message);
    const buffer = result.kind === "sample" ? result.values.buffer : result.normals.buffer;
    const reply: WorkerReply = { ok: true, result };
    parentPort?.postMessage(reply, buffer instanceof ArrayBuffer ? [buffer] : []);
  } catch (error) {
    const reply: WorkerReply = { ok: false, error: error instanceof Error ? error.message : String(error) };
    parentPort?.postMessage(reply);
  }
});
