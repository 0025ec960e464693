import { configHash, validateConfig, type Config } from "@keyshell/config";
import { buildCase } from "@keyshell/case";
import { solveLayout } from "@keyshell/layout";
import { estimateMeshCost, mesh, type Mesh } from "@keyshell/mesher";
import { deriveWiring } from "@keyshell/wiring";
import { PART_NAMES, type GenerateOptions, type GenerateOutcome } from "./types.js";

export function regenerationKey(config: Config, resolution: number): string {
  return `${configHash(config)}@${resolution}`;
}

/**
 * Full regeneration: layout, case solids, wiring and one mesh per part.
 * Config problems are reported before any geometry is built; the parts are
 * meshed one after another and a cancellation abandons the remaining ones.
 */
export async function generate(input: Config, options: GenerateOptions = {}): Promise<GenerateOutcome> {
  const validated = validateConfig(input);
  if (!validated.ok) {
    return { status: "failed", error: validated.error };
  }
  const config = validated.value;
  const resolution = options.resolution ?? config.preview.resolution;
  const isCancelled = options.isCancelled ?? (() => false);
  const log = options.log ?? (() => undefined);

  const solved = solveLayout(config);
  if (!solved.ok) {
    return { status: "failed", error: solved.error };
  }
  const layout = solved.value;
  const built = buildCase(layout, config);
  if (!built.ok) {
    return { status: "failed", error: built.error };
  }
  const solids = built.value;
  const wiring = deriveWiring(layout);

  const meshes: Mesh[] = [];
  for (const part of PART_NAMES) {
    const solid = solids[part];
    const cost = estimateMeshCost(solid.bounds, resolution);
    log(`meshing ${part}: ${cost.samples} samples${cost.interactive ? "" : " (slow at this resolution)"}`);

    const outcome = await mesh(solid, resolution, {
      pool: options.pool,
      isCancelled,
      maxSamples: options.maxSamples
    });
    if (outcome.status === "cancelled") {
      return outcome;
    }
    if (outcome.status === "failed") {
      return { status: "failed", error: outcome.error, part };
    }
    log(`meshed ${part}: ${outcome.mesh.indices.length / 3} triangles`);
    meshes.push(outcome.mesh);
  }
  const [rightHalf, leftHalf, bottomPlate] = meshes;

  return {
    status: "done",
    keyboard: {
      key: regenerationKey(config, resolution),
      resolution,
      config,
      layout,
      solids,
      meshes: { rightHalf, leftHalf, bottomPlate },
      wiring
    }
  };
}
