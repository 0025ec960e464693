import { readFileSync } from "node:fs";
import YAML from "js-yaml";
import { err, hashCanonicalValue, type CanonicalValue, type Result, type Vec2, type Vec3 } from "@keyshell/core";
import { DEFAULT_CONFIG } from "./defaults.js";
import { ConfigError } from "./errors.js";
import type { ColumnSpec, Config, ConfigIssue } from "./types.js";
import { validateConfig } from "./validate.js";

type RawRecord = Record<string, unknown>;

const DOCUMENT_KEYS = ["preview", "finger_cluster", "thumb_cluster", "keyboard"] as const;
const PREVIEW_KEYS = ["resolution"] as const;
const FINGER_CLUSTER_KEYS = ["rows", "columns", "key_distance", "home_row_index"] as const;
const THUMB_CLUSTER_KEYS = [
  "keys",
  "curvature_angle",
  "rotation",
  "offset",
  "key_distance",
  "resting_key_index"
] as const;
const KEYBOARD_KEYS = [
  "tilting_angle",
  "circumference_distance",
  "rounding_radius",
  "shell_thickness",
  "bottom_plate_thickness"
] as const;
const SIDE_COLUMN_KEYS = ["side_angle"] as const;
const NORMAL_COLUMN_KEYS = ["curvature_angle", "offset"] as const;

function isRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

class DocumentReader {
  public readonly issues: ConfigIssue[] = [];

  public section(doc: RawRecord, key: string, allowed: readonly string[]): RawRecord {
    const value = doc[key];
    if (value === undefined) return {};
    if (isRecord(value)) {
      this.unknownKeys(value, allowed, key);
      return value;
    }
    this.typeIssue(key, "a table", value);
    return {};
  }

  /** Reports every key of `record` outside `allowed`. */
  public unknownKeys(record: RawRecord, allowed: readonly string[], prefix: string): void {
    for (const key of Object.keys(record)) {
      if (!allowed.includes(key)) {
        this.issues.push({ code: "invalid-type", path: prefix ? `${prefix}.${key}` : key, message: "unknown key" });
      }
    }
  }

  public number(section: RawRecord, key: string, path: string, fallback: number): number {
    const value = section[key];
    if (value === undefined) return fallback;
    if (typeof value === "number") return value;
    this.typeIssue(path, "a number", value);
    return fallback;
  }

  public vec2(section: RawRecord, key: string, path: string, fallback: Vec2): Vec2 {
    const values = this.tuple(section[key], path, 2);
    return values ? { x: values[0], y: values[1] } : fallback;
  }

  public vec3(section: RawRecord, key: string, path: string, fallback: Vec3): Vec3 {
    const values = this.tuple(section[key], path, 3);
    return values ? { x: values[0], y: values[1], z: values[2] } : fallback;
  }

  public columns(section: RawRecord, fallback: ColumnSpec[]): ColumnSpec[] {
    const value = section.columns;
    if (value === undefined) return fallback.map((column) => ({ ...column }));
    if (!Array.isArray(value)) {
      this.typeIssue("finger_cluster.columns", "a list", value);
      return fallback.map((column) => ({ ...column }));
    }

    const out: ColumnSpec[] = [];
    value.forEach((entry: unknown, index) => {
      const path = `finger_cluster.columns[${index}]`;
      if (!isRecord(entry)) {
        this.typeIssue(path, "a table", entry);
        return;
      }
      if (entry.side_angle !== undefined) {
        if (entry.curvature_angle !== undefined || entry.offset !== undefined) {
          this.issues.push({
            code: "invalid-columns",
            path,
            message: "a column takes either side_angle or curvature_angle and offset"
          });
          return;
        }
        this.unknownKeys(entry, SIDE_COLUMN_KEYS, path);
        out.push({ kind: "side", sideAngle: this.number(entry, "side_angle", `${path}.side_angle`, Number.NaN) });
        return;
      }
      this.unknownKeys(entry, NORMAL_COLUMN_KEYS, path);
      for (const key of NORMAL_COLUMN_KEYS) {
        if (entry[key] === undefined) {
          this.issues.push({ code: "invalid-type", path: `${path}.${key}`, message: "missing required key" });
        }
      }
      const offset = this.tuple(entry.offset, `${path}.offset`, 2) ?? [0, 0];
      out.push({
        kind: "normal",
        curvatureAngle: this.number(entry, "curvature_angle", `${path}.curvature_angle`, 0),
        offset: { y: offset[0], z: offset[1] }
      });
    });
    return out;
  }

  private tuple(value: unknown, path: string, size: number): number[] | undefined {
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || value.length !== size) {
      this.typeIssue(path, `a list of ${size} numbers`, value);
      return undefined;
    }
    const numbers: number[] = [];
    for (const item of value) {
      if (typeof item !== "number") {
        this.typeIssue(path, `a list of ${size} numbers`, value);
        return undefined;
      }
      numbers.push(item);
    }
    return numbers;
  }

  private typeIssue(path: string, expected: string, value: unknown): void {
    this.issues.push({ code: "invalid-type", path, message: `expected ${expected}, got ${JSON.stringify(value)}` });
  }
}

/**
 * Reads a snake_case config document. Missing keys keep their default value,
 * except the angle and offset of a normal column; unknown keys are issues.
 * The merged result is then validated.
 */
export function parseConfig(document: unknown): Result<Readonly<Config>, ConfigError> {
  if (document === undefined || document === null) {
    return validateConfig(DEFAULT_CONFIG);
  }
  if (!isRecord(document)) {
    return err(new ConfigError([{ code: "invalid-type", path: "", message: "config document must be a table" }]));
  }

  const reader = new DocumentReader();
  reader.unknownKeys(document, DOCUMENT_KEYS, "");
  const preview = reader.section(document, "preview", PREVIEW_KEYS);
  const finger = reader.section(document, "finger_cluster", FINGER_CLUSTER_KEYS);
  const thumb = reader.section(document, "thumb_cluster", THUMB_CLUSTER_KEYS);
  const keyboard = reader.section(document, "keyboard", KEYBOARD_KEYS);
  const d = DEFAULT_CONFIG;

  const config: Config = {
    preview: {
      resolution: reader.number(preview, "resolution", "preview.resolution", d.preview.resolution)
    },
    fingerCluster: {
      rows: reader.number(finger, "rows", "finger_cluster.rows", d.fingerCluster.rows),
      columns: reader.columns(finger, d.fingerCluster.columns),
      keyDistance: reader.vec2(finger, "key_distance", "finger_cluster.key_distance", d.fingerCluster.keyDistance),
      homeRowIndex: reader.number(finger, "home_row_index", "finger_cluster.home_row_index", d.fingerCluster.homeRowIndex)
    },
    thumbCluster: {
      keys: reader.number(thumb, "keys", "thumb_cluster.keys", d.thumbCluster.keys),
      curvatureAngle: reader.number(thumb, "curvature_angle", "thumb_cluster.curvature_angle", d.thumbCluster.curvatureAngle),
      rotation: reader.vec3(thumb, "rotation", "thumb_cluster.rotation", d.thumbCluster.rotation),
      offset: reader.vec3(thumb, "offset", "thumb_cluster.offset", d.thumbCluster.offset),
      keyDistance: reader.number(thumb, "key_distance", "thumb_cluster.key_distance", d.thumbCluster.keyDistance),
      restingKeyIndex: reader.number(
        thumb,
        "resting_key_index",
        "thumb_cluster.resting_key_index",
        d.thumbCluster.restingKeyIndex
      )
    },
    keyboard: {
      tiltingAngle: reader.vec2(keyboard, "tilting_angle", "keyboard.tilting_angle", d.keyboard.tiltingAngle),
      circumferenceDistance: reader.number(
        keyboard,
        "circumference_distance",
        "keyboard.circumference_distance",
        d.keyboard.circumferenceDistance
      ),
      roundingRadius: reader.number(keyboard, "rounding_radius", "keyboard.rounding_radius", d.keyboard.roundingRadius),
      shellThickness: reader.number(keyboard, "shell_thickness", "keyboard.shell_thickness", d.keyboard.shellThickness),
      bottomPlateThickness: reader.number(
        keyboard,
        "bottom_plate_thickness",
        "keyboard.bottom_plate_thickness",
        d.keyboard.bottomPlateThickness
      )
    }
  };

  if (reader.issues.length > 0) {
    return err(new ConfigError(reader.issues));
  }
  return validateConfig(config);
}

export function parseConfigYaml(source: string): Result<Readonly<Config>, ConfigError> {
  let document: unknown;
  try {
    document = YAML.load(source);
  } catch (error) {
    return err(new ConfigError([{ code: "invalid-type", path: "", message: `YAML parse error: ${error instanceof Error ? error.message : String(error)}` }]));
  }
  return parseConfig(document);
}

export function loadConfigFromYaml(path: string): Result<Readonly<Config>, ConfigError> {
  return parseConfigYaml(readFileSync(path, "utf8"));
}

/** The snake_case document `parseConfig` reads back to the same config. */
export function toConfigDocument(config: Config): CanonicalValue {
  return {
    preview: {
      resolution: config.preview.resolution
    },
    finger_cluster: {
      rows: config.fingerCluster.rows,
      columns: config.fingerCluster.columns.map((column): CanonicalValue =>
        column.kind === "side"
          ? { side_angle: column.sideAngle }
          : { curvature_angle: column.curvatureAngle, offset: [column.offset.y, column.offset.z] }
      ),
      key_distance: [config.fingerCluster.keyDistance.x, config.fingerCluster.keyDistance.y],
      home_row_index: config.fingerCluster.homeRowIndex
    },
    thumb_cluster: {
      keys: config.thumbCluster.keys,
      curvature_angle: config.thumbCluster.curvatureAngle,
      rotation: [config.thumbCluster.rotation.x, config.thumbCluster.rotation.y, config.thumbCluster.rotation.z],
      offset: [config.thumbCluster.offset.x, config.thumbCluster.offset.y, config.thumbCluster.offset.z],
      key_distance: config.thumbCluster.keyDistance,
      resting_key_index: config.thumbCluster.restingKeyIndex
    },
    keyboard: {
      tilting_angle: [config.keyboard.tiltingAngle.x, config.keyboard.tiltingAngle.y],
      circumference_distance: config.keyboard.circumferenceDistance,
      rounding_radius: config.keyboard.roundingRadius,
      shell_thickness: config.keyboard.shellThickness,
      bottom_plate_thickness: config.keyboard.bottomPlateThickness
    }
  };
}

export function serializeConfigYaml(config: Config): string {
  return YAML.dump(toConfigDocument(config), { flowLevel: 3, lineWidth: 120 });
}

/** Hash of every parameter that affects generated geometry. */
export function configHash(config: Config): string {
  return hashCanonicalValue(toConfigDocument(config)).sha256;
}
