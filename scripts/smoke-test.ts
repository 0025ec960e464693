import { resolve } from "node:path";
import { loadConfigFromYaml } from "../packages/config/src/index.js";
import { generate, writeKeyboard } from "../packages/engine/src/index.js";

async function main(): Promise<void> {
  const loaded = loadConfigFromYaml(resolve("keyshell.yaml"));
  if (!loaded.ok) {
    throw loaded.error;
  }
  const outcome = await generate(loaded.value, {
    resolution: 2,
    log: (message) => console.log(`[smoke] ${message}`)
  });
  if (outcome.status !== "done") {
    throw new Error(outcome.status === "failed" ? outcome.error.message : "generation was cancelled");
  }

  const written = writeKeyboard(resolve("out/smoke"), outcome.keyboard);
  console.log("[smoke] wrote:");
  console.log(written.join("\n"));
  console.log("[smoke] full resolution with:");
  console.log("npm run keyshell -- generate keyshell.yaml --out out");
}

main().catch((error: unknown) => {
  console.error(`[smoke] failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
