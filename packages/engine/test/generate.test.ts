import { afterAll, describe, expect, it } from "vitest";
import { cpus } from "node:os";
import { ConfigError, defaultConfig, type Config } from "@keyshell/config";
import { checkTopology, MesherWorkerPool } from "@keyshell/mesher";
import { generate, PART_NAMES, type GeneratedKeyboard, type GenerateOptions } from "../src/index.js";

async function generateOrThrow(config: Config, options: GenerateOptions): Promise<GeneratedKeyboard> {
  const outcome = await generate(config, options);
  if (outcome.status !== "done") {
    throw new Error(outcome.status === "failed" ? outcome.error.message : "cancelled");
  }
  return outcome.keyboard;
}

describe("generate", () => {
  it("reports config errors before building geometry", async () => {
    const config = defaultConfig();
    config.keyboard.shellThickness = -1;
    const outcome = await generate(config, { resolution: 2 });

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(outcome.error).toBeInstanceOf(ConfigError);
    expect(outcome.part).toBeUndefined();
  });

  it("reports an unusable resolution against the first part", async () => {
    const outcome = await generate(defaultConfig(), { resolution: 0 });
    expect(outcome.status === "failed" && outcome.part).toBe("rightHalf");
    expect(outcome.status === "failed" && "code" in outcome.error && outcome.error.code).toBe("invalid-resolution");
  });

  it("stops when cancelled", async () => {
    const outcome = await generate(defaultConfig(), { resolution: 2, isCancelled: () => true });
    expect(outcome).toEqual({ status: "cancelled" });
  });

  it("yields identical meshes for an unchanged config and resolution", async () => {
    const first = await generateOrThrow(defaultConfig(), { resolution: 2 });
    const second = await generateOrThrow(defaultConfig(), { resolution: 2 });

    expect(second.key).toBe(first.key);
    for (const part of PART_NAMES) {
      expect(second.meshes[part].positions).toEqual(first.meshes[part].positions);
      expect(second.meshes[part].indices).toEqual(first.meshes[part].indices);
    }
    expect(second.wiring).toEqual(first.wiring);
  });

  it("derives the wiring from the same layout as the case", async () => {
    const keyboard = await generateOrThrow(defaultConfig(), { resolution: 2 });
    expect(keyboard.wiring.keys).toHaveLength(21);
    expect(keyboard.resolution).toBe(2);
    expect(keyboard.config.fingerCluster.rows).toBe(3);
  });

  it("logs each part it meshes", async () => {
    const messages: string[] = [];
    await generateOrThrow(defaultConfig(), { resolution: 2, log: (message) => messages.push(message) });
    expect(messages).toHaveLength(6);
    expect(messages[0]).toMatch(/^meshing rightHalf: \d+ samples$/);
    expect(messages[5]).toMatch(/^meshed bottomPlate: \d+ triangles$/);
  });
});

describe("generate on worker threads", () => {
  const pool = new MesherWorkerPool(Math.max(2, cpus().length - 1));

  afterAll(async () => {
    await pool.close();
  });

  it("matches the single threaded result", async () => {
    const sequential = await generateOrThrow(defaultConfig(), { resolution: 2 });
    const parallel = await generateOrThrow(defaultConfig(), { resolution: 2, pool });
    for (const part of PART_NAMES) {
      expect(parallel.meshes[part].positions).toEqual(sequential.meshes[part].positions);
      expect(parallel.meshes[part].indices).toEqual(sequential.meshes[part].indices);
    }
  });

  for (const resolution of [2, 1, 0.5]) {
    it(
      `closes every part of the default keyboard at resolution ${resolution}`,
      async () => {
        const keyboard = await generateOrThrow(defaultConfig(), { resolution, pool });
        for (const part of PART_NAMES) {
          const { positions, indices } = keyboard.meshes[part];
          const report = checkTopology(indices, positions.length / 3);
          expect(report.boundaryEdges).toBe(0);
          expect(report.overusedEdges).toBe(0);
          expect(report.watertight).toBe(true);
        }
      },
      600_000
    );
  }
});
