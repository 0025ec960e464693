import { validateConfig, type Config, type ConfigError } from "@keyshell/config";
import type { MeshError, MesherWorkerPool } from "@keyshell/mesher";
import { generate, regenerationKey } from "./generate.js";
import type { GeneratedKeyboard, GenerateOutcome, PartName } from "./types.js";

export type RegenerationOutcome =
  | { status: "completed"; generation: number; keyboard: GeneratedKeyboard; memoized: boolean }
  | { status: "superseded"; generation: number }
  | { status: "failed"; generation: number; error: ConfigError | MeshError; part?: PartName };

export interface RegenerationSchedulerOptions {
  pool?: MesherWorkerPool;
  maxSamples?: number;
  log?: (message: string) => void;
}

/**
 * Live reload driver. Every submission takes the next generation number;
 * a running regeneration polls the counter and gives up once a newer
 * submission arrived, so only the most recent config ever completes.
 * The last successful result is kept and handed out again for an unchanged
 * config and resolution.
 */
export class RegenerationScheduler {
  private generation = 0;
  private latestKeyboard?: GeneratedKeyboard;

  public constructor(private readonly options: RegenerationSchedulerOptions = {}) {}

  public get currentGeneration(): number {
    return this.generation;
  }

  /** Result of the last completed regeneration. */
  public get latest(): GeneratedKeyboard | undefined {
    return this.latestKeyboard;
  }

  public async submit(config: Config, resolution?: number): Promise<RegenerationOutcome> {
    const generation = ++this.generation;
    this.options.pool?.clearQueue();

    const validated = validateConfig(config);
    if (!validated.ok) {
      return { status: "failed", generation, error: validated.error };
    }
    const checked = validated.value;
    const key = regenerationKey(checked, resolution ?? checked.preview.resolution);
    if (this.latestKeyboard && this.latestKeyboard.key === key) {
      return { status: "completed", generation, keyboard: this.latestKeyboard, memoized: true };
    }

    const superseded = (): boolean => generation !== this.generation;
    let outcome: GenerateOutcome;
    try {
      outcome = await generate(checked, {
        resolution,
        pool: this.options.pool,
        maxSamples: this.options.maxSamples,
        log: this.options.log,
        isCancelled: superseded
      });
    } catch (error) {
      // Dropping queued pool tasks rejects them in the abandoned run
      if (superseded()) {
        return { status: "superseded", generation };
      }
      throw error;
    }

    if (outcome.status === "cancelled" || superseded()) {
      return { status: "superseded", generation };
    }
    if (outcome.status === "failed") {
      return { status: "failed", generation, error: outcome.error, part: outcome.part };
    }
    this.latestKeyboard = outcome.keyboard;
    return { status: "completed", generation, keyboard: outcome.keyboard, memoized: false };
  }
}
