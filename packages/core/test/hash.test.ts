import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { encodeCanonicalBytes, hashCanonicalValue } from "../src/index.js";

describe("hashCanonicalValue", () => {
  it("ignores object key order", () => {
    const a = hashCanonicalValue({ rows: 3, keyDistance: { x: 19.05, y: 19.05 }, name: "split" });
    const b = hashCanonicalValue({ name: "split", keyDistance: { y: 19.05, x: 19.05 }, rows: 3 });
    expect(a.sha256).toBe(b.sha256);
  });

  it("treats negative zero as zero", () => {
    expect(hashCanonicalValue({ angle: -0 }).sha256).toBe(hashCanonicalValue({ angle: 0 }).sha256);
  });

  it("skips undefined entries", () => {
    expect(hashCanonicalValue({ a: 1, b: undefined }).sha256).toBe(hashCanonicalValue({ a: 1 }).sha256);
  });

  it("distinguishes array order", () => {
    expect(hashCanonicalValue([1, 2]).sha256).not.toBe(hashCanonicalValue([2, 1]).sha256);
  });

  it("rejects non-finite numbers", () => {
    expect(() => encodeCanonicalBytes({ value: Number.NaN })).toThrow(/non-finite/);
  });

  it("starts with the magic header", () => {
    const bytes = encodeCanonicalBytes(null);
    expect([...bytes]).toEqual([0x4b, 0x53, 0x30, 0x31, 0x01, 0x00]);
  });

  it("property: equal records hash equally regardless of insertion order", () => {
    fc.assert(
      fc.property(
        fc.dictionary(fc.string({ minLength: 1, maxLength: 6 }), fc.double({ noNaN: true, noDefaultInfinity: true })),
        (record) => {
          const reversed = Object.fromEntries(Object.entries(record).reverse());
          return hashCanonicalValue(record).sha256 === hashCanonicalValue(reversed).sha256;
        }
      )
    );
  });
});
