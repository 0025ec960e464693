import { err, ok, type Result, type Vec2, type Vec3 } from "@keyshell/core";
import { LIMITS } from "./defaults.js";
import { ConfigError } from "./errors.js";
import type { ColumnSpec, Config, ConfigIssue } from "./types.js";

class IssueCollector {
  public readonly issues: ConfigIssue[] = [];

  public finite(path: string, value: number): boolean {
    if (!Number.isFinite(value)) {
      this.issues.push({ code: "non-finite", path, message: `expected a finite number, got ${String(value)}` });
      return false;
    }
    return true;
  }

  public positive(path: string, value: number): void {
    if (this.finite(path, value) && value <= 0) {
      this.issues.push({ code: "non-positive", path, message: `expected a positive number, got ${value}` });
    }
  }

  public range(path: string, value: number, min: number, max: number): void {
    if (this.finite(path, value) && (value < min || value > max)) {
      this.issues.push({ code: "out-of-range", path, message: `expected a value in [${min}, ${max}], got ${value}` });
    }
  }

  public integer(path: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value)) {
      this.issues.push({ code: "invalid-type", path, message: `expected an integer, got ${String(value)}` });
      return;
    }
    this.range(path, value, min, max);
  }

  public vec2(path: string, value: Vec2): void {
    this.finite(`${path}.x`, value.x);
    this.finite(`${path}.y`, value.y);
  }

  public vec3(path: string, value: Vec3): void {
    this.finite(`${path}.x`, value.x);
    this.finite(`${path}.y`, value.y);
    this.finite(`${path}.z`, value.z);
  }

  public columns(issue: string): void {
    this.issues.push({ code: "invalid-columns", path: "fingerCluster.columns", message: issue });
  }
}

function checkColumns(columns: ColumnSpec[], collector: IssueCollector): void {
  const count = columns.length;
  if (count < LIMITS.columns.min || count > LIMITS.columns.max) {
    collector.issues.push({
      code: "out-of-range",
      path: "fingerCluster.columns",
      message: `expected ${LIMITS.columns.min} to ${LIMITS.columns.max} columns, got ${count}`
    });
  }

  columns.forEach((column, index) => {
    const path = `fingerCluster.columns[${index}]`;
    switch (column.kind) {
      case "normal":
        collector.range(`${path}.curvatureAngle`, column.curvatureAngle, LIMITS.curvatureAngle.min, LIMITS.curvatureAngle.max);
        collector.finite(`${path}.offset.y`, column.offset.y);
        collector.finite(`${path}.offset.z`, column.offset.z);
        break;
      case "side": {
        collector.range(`${path}.sideAngle`, column.sideAngle, LIMITS.sideAngle.min, LIMITS.sideAngle.max);
        if (index !== 0 && index !== count - 1) {
          collector.columns(`side column at index ${index} must be the first or last column`);
          break;
        }
        const neighbor = index === 0 ? columns[1] : columns[count - 2];
        if (!neighbor || neighbor.kind !== "normal") {
          collector.columns(`side column at index ${index} needs a normal neighbor column`);
        }
        break;
      }
    }
  });

  if (count > 0 && !columns.some((column) => column.kind === "normal")) {
    collector.columns("normal columns must not be empty");
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const item of Object.values(value)) {
    if (item !== null && typeof item === "object" && !Object.isFrozen(item)) {
      deepFreeze(item);
    }
  }
  return Object.freeze(value);
}

/** Lists every problem with `config`; empty when it is valid. */
export function collectConfigIssues(config: Config): ConfigIssue[] {
  const collector = new IssueCollector();
  const { preview, fingerCluster, thumbCluster, keyboard } = config;

  collector.positive("preview.resolution", preview.resolution);

  collector.integer("fingerCluster.rows", fingerCluster.rows, LIMITS.rows.min, LIMITS.rows.max);
  checkColumns(fingerCluster.columns, collector);
  collector.positive("fingerCluster.keyDistance.x", fingerCluster.keyDistance.x);
  collector.positive("fingerCluster.keyDistance.y", fingerCluster.keyDistance.y);
  collector.integer("fingerCluster.homeRowIndex", fingerCluster.homeRowIndex, 0, Math.max(0, fingerCluster.rows - 1));

  collector.integer("thumbCluster.keys", thumbCluster.keys, LIMITS.thumbKeys.min, LIMITS.thumbKeys.max);
  collector.range(
    "thumbCluster.curvatureAngle",
    thumbCluster.curvatureAngle,
    LIMITS.curvatureAngle.min,
    LIMITS.curvatureAngle.max
  );
  collector.vec3("thumbCluster.rotation", thumbCluster.rotation);
  collector.vec3("thumbCluster.offset", thumbCluster.offset);
  collector.positive("thumbCluster.keyDistance", thumbCluster.keyDistance);
  collector.integer("thumbCluster.restingKeyIndex", thumbCluster.restingKeyIndex, 0, Math.max(0, thumbCluster.keys - 1));

  collector.vec2("keyboard.tiltingAngle", keyboard.tiltingAngle);
  collector.positive("keyboard.circumferenceDistance", keyboard.circumferenceDistance);
  collector.positive("keyboard.roundingRadius", keyboard.roundingRadius);
  collector.positive("keyboard.shellThickness", keyboard.shellThickness);
  collector.positive("keyboard.bottomPlateThickness", keyboard.bottomPlateThickness);

  return collector.issues;
}

/**
 * Checks `config` against the supported ranges. A valid config comes back as
 * a frozen deep copy, so later stages can share it freely.
 */
export function validateConfig(config: Config): Result<Readonly<Config>, ConfigError> {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) {
    return err(new ConfigError(issues));
  }
  return ok(deepFreeze(structuredClone(config)));
}
