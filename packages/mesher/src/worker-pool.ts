import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import type { ImplicitSolid } from "@keyshell/sdf";
import type { MesherMessage, MesherResult, MesherTask, NormalsTask, SampleTask, WorkerReply } from "./protocol.js";

interface PendingTask {
  task: MesherTask;
  solid: ImplicitSolid;
  resolve: (value: MesherResult) => void;
  reject: (error: unknown) => void;
}

interface WorkerState {
  worker: Worker;
  busy: boolean;
  /** Solid the worker has compiled most recently. */
  loaded?: number;
  current?: PendingTask;
}

type TaskInput<T extends MesherTask> = Omit<T, "kind" | "solidId">;

export interface MesherWorkerPoolOptions {
  /** Worker module to run instead of the bundled mesher worker. */
  workerModule?: URL;
}

/**
 * Fixed set of worker threads evaluating solids. A solid is sent to each
 * worker once and referenced by id afterwards. A worker that crashes fails
 * its current task and is replaced.
 */
export class MesherWorkerPool {
  private readonly workers: WorkerState[] = [];
  private readonly queue: PendingTask[] = [];
  private readonly solidIds = new WeakMap<ImplicitSolid, number>();
  private readonly workerUrl: URL;
  private readonly execArgv: string[];
  private nextSolidId = 1;
  private closed = false;

  public constructor(size: number, options: MesherWorkerPoolOptions = {}) {
    const n = Math.max(1, size);
    const herePath = fileURLToPath(import.meta.url);
    const tsRuntime = herePath.endsWith(".ts");
    const workerModule = tsRuntime ? "./workers/mesher-worker.ts" : "./workers/mesher-worker.js";
    this.workerUrl = options.workerModule ?? new URL(workerModule, import.meta.url);
    this.execArgv = tsRuntime ? [...process.execArgv, "--import", "tsx"] : process.execArgv;

    for (let i = 0; i < n; i++) {
      this.workers.push(this.spawn());
    }
  }

  public get size(): number {
    return this.workers.length;
  }

  public async sample(solid: ImplicitSolid, input: TaskInput<SampleTask>): Promise<Float32Array> {
    const result = await this.run(solid, { kind: "sample", solidId: this.idOf(solid), ...input });
    if (result.kind !== "sample") {
      throw new Error(`Expected sample result, got ${result.kind}`);
    }
    return result.values;
  }

  public async normals(solid: ImplicitSolid, input: TaskInput<NormalsTask>): Promise<Float32Array> {
    const result = await this.run(solid, { kind: "normals", solidId: this.idOf(solid), ...input });
    if (result.kind !== "normals") {
      throw new Error(`Expected normals result, got ${result.kind}`);
    }
    return result.normals;
  }

  /** Drops tasks that no worker has picked up yet. Their promises reject. */
  public clearQueue(): void {
    const dropped = this.queue.splice(0);
    for (const pending of dropped) {
      pending.reject(new Error("Task dropped from the mesher queue"));
    }
  }

  public async close(): Promise<void> {
    this.closed = true;
    this.clearQueue();
    await Promise.all(this.workers.map((w) => w.worker.terminate()));
  }

  private spawn(): WorkerState {
    const worker = new Worker(this.workerUrl, {
      execArgv: this.execArgv
    });
    const state: WorkerState = {
      worker,
      busy: false
    };

    worker.on("message", (message: WorkerReply) => {
      const current = state.current;
      state.current = undefined;
      state.busy = false;
      if (!current) return;
      if (message.ok) {
        current.resolve(message.result);
      } else {
        state.loaded = undefined;
        current.reject(new Error(message.error));
      }
      this.pump();
    });

    worker.on("error", (err) => {
      const current = state.current;
      state.current = undefined;
      const index = this.workers.indexOf(state);
      if (index >= 0) {
        this.workers.splice(index, 1);
      }
      if (current) {
        current.reject(err);
      }
      if (this.closed) return;
      this.workers.push(this.spawn());
      this.pump();
    });

    return state;
  }

  private idOf(solid: ImplicitSolid): number {
    let id = this.solidIds.get(solid);
    if (id === undefined) {
      id = this.nextSolidId++;
      this.solidIds.set(solid, id);
    }
    return id;
  }

  private run(solid: ImplicitSolid, task: MesherTask): Promise<MesherResult> {
    if (this.closed) {
      return Promise.reject(new Error("Mesher worker pool is closed"));
    }
    return new Promise<MesherResult>((resolve, reject) => {
      this.queue.push({ task, solid, resolve, reject });
      this.pump();
    });
  }

  private pump(): void {
    for (const state of this.workers) {
      if (state.busy) continue;
      const next = this.queue.shift();
      if (!next) return;
      state.current = next;
      state.busy = true;
      const message: MesherMessage = state.loaded === next.task.solidId ? next.task : { ...next.task, solid: next.solid };
      state.loaded = next.task.solidId;
      state.worker.postMessage(message);
    }
  }
}
