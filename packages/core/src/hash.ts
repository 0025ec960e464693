import { createHash } from "node:crypto";
import { Buffer } from "node:buffer";
import type { CanonicalHashResult } from "./types.js";

/** Values the canonical encoder accepts: plain data built from JSON-like parts. */
export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue | undefined };

const TAG_NULL = 0x00;
const TAG_FALSE = 0x01;
const TAG_TRUE = 0x02;
const TAG_NUMBER = 0x03;
const TAG_STRING = 0x04;
const TAG_ARRAY = 0x05;
const TAG_OBJECT = 0x06;

function writeU32LE(target: number[], value: number): void {
  target.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
}

function writeF64LE(target: number[], value: number): void {
  const buffer = Buffer.alloc(8);
  // -0 and 0 describe the same parameter
  buffer.writeDoubleLE(Object.is(value, -0) ? 0 : value, 0);
  for (const byte of buffer) {
    target.push(byte);
  }
}

function encodeString(target: number[], value: string): void {
  const utf8 = Buffer.from(value, "utf8");
  writeU32LE(target, utf8.length);
  for (const byte of utf8) {
    target.push(byte);
  }
}

function isCanonicalArray(value: CanonicalValue): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}

function encodeValue(target: number[], value: CanonicalValue): void {
  if (value === null) {
    target.push(TAG_NULL);
    return;
  }
  if (typeof value === "boolean") {
    target.push(value ? TAG_TRUE : TAG_FALSE);
    return;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Cannot canonically encode non-finite number: ${value}`);
    }
    target.push(TAG_NUMBER);
    writeF64LE(target, value);
    return;
  }
  if (typeof value === "string") {
    target.push(TAG_STRING);
    encodeString(target, value);
    return;
  }
  if (isCanonicalArray(value)) {
    target.push(TAG_ARRAY);
    writeU32LE(target, value.length);
    for (const item of value) {
      encodeValue(target, item);
    }
    return;
  }

  const entries: Array<[string, CanonicalValue]> = [];
  for (const [key, item] of Object.entries(value)) {
    if (item !== undefined) {
      entries.push([key, item]);
    }
  }
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  target.push(TAG_OBJECT);
  writeU32LE(target, entries.length);
  for (const [key, item] of entries) {
    encodeString(target, key);
    encodeValue(target, item);
  }
}

export function encodeCanonicalBytes(value: CanonicalValue): Uint8Array {
  const bytes: number[] = [];

  // Magic KS01
  bytes.push(0x4b, 0x53, 0x30, 0x31);
  // Endianness marker (little-endian)
  bytes.push(0x01);

  encodeValue(bytes, value);
  return Uint8Array.from(bytes);
}

export function hashCanonicalValue(value: CanonicalValue): CanonicalHashResult {
  const canonicalBytes = encodeCanonicalBytes(value);
  const sha256 = createHash("sha256").update(canonicalBytes).digest("hex");
  return { sha256, canonicalBytes };
}
