#!/usr/bin/env node
import minimist from "minimist";
import { watch, writeFileSync } from "node:fs";
import { cpus } from "node:os";
import { resolve } from "node:path";
import { defaultConfig, loadConfigFromYaml, serializeConfigYaml, type Config } from "@keyshell/config";
import { buildCase } from "@keyshell/case";
import { solveLayout } from "@keyshell/layout";
import { MesherWorkerPool, estimateMeshCost } from "@keyshell/mesher";
import { deriveWiring } from "@keyshell/wiring";
import { generate } from "./generate.js";
import { writeKeyboard, writeWiring } from "./fs.js";
import { RegenerationScheduler } from "./scheduler.js";
import { PART_NAMES } from "./types.js";

function printHelp(): void {
  console.log(`keyshell

Usage:
  keyshell generate [config.yaml] --out out
  keyshell wiring [config.yaml] --out out
  keyshell estimate [config.yaml] --resolution 0.5
  keyshell watch <config.yaml> --out out
  keyshell defaults [--out keyshell.yaml]

Options:
  --out <path>             Output directory, or file for defaults (default: out)
  --resolution <mm>        Meshing cell size (default: preview.resolution of the config)
  --workers <n>            Worker count (default: CPU-1, 1 meshes on the main thread)
  --max-samples <n>        Refuse resolutions needing more samples than this
`);
}

function log(message: string): void {
  console.log(`[keyshell] ${message}`);
}

function loadConfig(path: unknown): Config {
  if (path === undefined) {
    return defaultConfig();
  }
  const loaded = loadConfigFromYaml(resolve(String(path)));
  if (!loaded.ok) {
    throw loaded.error;
  }
  return loaded.value;
}

function numberOption(value: unknown, name: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} expects a number, got ${String(value)}`);
  }
  return parsed;
}

function createPool(workers: number | undefined): MesherWorkerPool | undefined {
  const count = workers !== undefined && workers > 0 ? workers : Math.max(1, cpus().length - 1);
  return count > 1 ? new MesherWorkerPool(count) : undefined;
}

async function runGenerate(config: Config, outDir: string, argv: minimist.ParsedArgs): Promise<void> {
  const pool = createPool(numberOption(argv.workers, "workers"));
  try {
    const outcome = await generate(config, {
      resolution: numberOption(argv.resolution, "resolution"),
      maxSamples: numberOption(argv["max-samples"], "max-samples"),
      pool,
      log
    });
    if (outcome.status === "cancelled") {
      throw new Error("Generation was cancelled");
    }
    if (outcome.status === "failed") {
      throw outcome.error;
    }
    for (const path of writeKeyboard(outDir, outcome.keyboard)) {
      log(`wrote ${path}`);
    }
  } finally {
    if (pool) {
      await pool.close();
    }
  }
}

function runWiring(config: Config, outDir: string): void {
  const solved = solveLayout(config);
  if (!solved.ok) {
    throw solved.error;
  }
  log(`wrote ${writeWiring(outDir, deriveWiring(solved.value))}`);
}

function runEstimate(config: Config, argv: minimist.ParsedArgs): void {
  const solved = solveLayout(config);
  if (!solved.ok) {
    throw solved.error;
  }
  const built = buildCase(solved.value, config);
  if (!built.ok) {
    throw built.error;
  }
  const resolution = numberOption(argv.resolution, "resolution") ?? config.preview.resolution;
  const estimates = Object.fromEntries(
    PART_NAMES.map((part) => [part, estimateMeshCost(built.value[part].bounds, resolution)])
  );
  console.log(JSON.stringify({ resolution, parts: estimates }, null, 2));
}

async function runWatch(path: string, outDir: string, argv: minimist.ParsedArgs): Promise<void> {
  const pool = createPool(numberOption(argv.workers, "workers"));
  const scheduler = new RegenerationScheduler({
    pool,
    maxSamples: numberOption(argv["max-samples"], "max-samples"),
    log
  });
  const resolution = numberOption(argv.resolution, "resolution");

  const regenerate = async (): Promise<void> => {
    const loaded = loadConfigFromYaml(path);
    if (!loaded.ok) {
      log(loaded.error.message);
      return;
    }
    const outcome = await scheduler.submit(loaded.value, resolution);
    if (outcome.status === "superseded") {
      log(`generation ${outcome.generation} superseded`);
    } else if (outcome.status === "failed") {
      log(`generation ${outcome.generation} failed: ${outcome.error.message}`);
    } else if (outcome.memoized) {
      log(`generation ${outcome.generation} unchanged`);
    } else {
      writeKeyboard(outDir, outcome.keyboard);
      log(`generation ${outcome.generation} written to ${outDir}`);
    }
  };

  const report = (error: unknown): void => {
    log(error instanceof Error ? error.message : String(error));
  };

  log(`watching ${path}`);
  const watcher = watch(path, () => {
    regenerate().catch(report);
  });
  await regenerate();

  await new Promise<void>((resolveStop) => {
    process.once("SIGINT", () => {
      watcher.close();
      resolveStop();
    });
  });
  if (pool) {
    await pool.close();
  }
}

async function run(): Promise<void> {
  const argv = minimist(process.argv.slice(2), {
    string: ["out", "resolution", "workers", "max-samples"]
  });

  const command = argv._[0];
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }
  const configPath = argv._[1];
  const out = typeof argv.out === "string" && argv.out ? argv.out : undefined;
  const outDir = resolve(out ?? "out");

  switch (command) {
    case "generate":
      await runGenerate(loadConfig(configPath), outDir, argv);
      return;
    case "wiring":
      runWiring(loadConfig(configPath), outDir);
      return;
    case "estimate":
      runEstimate(loadConfig(configPath), argv);
      return;
    case "watch":
      if (configPath === undefined) {
        throw new Error("Missing config argument.");
      }
      await runWatch(resolve(String(configPath)), outDir, argv);
      return;
    case "defaults": {
      const yaml = serializeConfigYaml(defaultConfig());
      if (out === undefined) {
        process.stdout.write(yaml);
      } else {
        writeFileSync(resolve(out), yaml);
        log(`wrote ${resolve(out)}`);
      }
      return;
    }
    default:
      throw new Error(`Unknown command: ${String(command)}`);
  }
}

run().catch((error: unknown) => {
  console.error(`[keyshell] ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && typeof error.stack === "string" && error.stack.trim()) {
    console.error(error.stack);
  }
  process.exit(1);
});
