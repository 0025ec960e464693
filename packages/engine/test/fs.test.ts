import { afterAll, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, rmSync, statSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defaultConfig } from "@keyshell/config";
import { generate, PART_FILES, WIRING_FILE, writeKeyboard } from "../src/index.js";

describe("writeKeyboard", () => {
  const outDir = mkdtempSync(join(tmpdir(), "keyshell-"));

  afterAll(() => {
    rmSync(outDir, { recursive: true, force: true });
  });

  it("writes one STL per part and the wiring layout", async () => {
    const outcome = await generate(defaultConfig(), { resolution: 2 });
    expect(outcome.status).toBe("done");
    if (outcome.status !== "done") return;

    const written = writeKeyboard(join(outDir, "nested"), outcome.keyboard);
    expect(written).toEqual([
      join(outDir, "nested", PART_FILES.rightHalf),
      join(outDir, "nested", PART_FILES.leftHalf),
      join(outDir, "nested", PART_FILES.bottomPlate),
      join(outDir, "nested", WIRING_FILE)
    ]);

    const triangles = outcome.keyboard.meshes.bottomPlate.indices.length / 3;
    expect(statSync(written[2]).size).toBe(84 + 50 * triangles);

    const wiring: unknown = JSON.parse(readFileSync(written[3], "utf8"));
    expect(wiring).toEqual(JSON.parse(JSON.stringify(outcome.keyboard.wiring)));
  });
});
