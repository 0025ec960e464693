import { mkdirSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { encodeStl } from "@keyshell/mesher";
import type { WiringLayout } from "@keyshell/wiring";
import { PART_NAMES, type GeneratedKeyboard, type PartName } from "./types.js";

export const PART_FILES: Record<PartName, string> = {
  rightHalf: "right-half.stl",
  leftHalf: "left-half.stl",
  bottomPlate: "bottom-plate.stl"
};

export const WIRING_FILE = "wiring.json";

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function writeWiring(outDir: string, wiring: WiringLayout): string {
  ensureDir(outDir);
  const path = resolve(outDir, WIRING_FILE);
  writeFileSync(path, `${JSON.stringify(wiring, null, 2)}\n`);
  return path;
}

/** Writes one binary STL per part plus the wiring layout. Returns the written paths. */
export function writeKeyboard(outDir: string, keyboard: GeneratedKeyboard): string[] {
  ensureDir(outDir);
  const written = PART_NAMES.map((part) => {
    const path = resolve(outDir, PART_FILES[part]);
    writeFileSync(path, encodeStl(keyboard.meshes[part], `keyshell ${part}`));
    return path;
  });
  written.push(writeWiring(outDir, keyboard.wiring));
  return written;
}
