/**
 * Coercion rules of the environment readers backing the `TELEMETR_*`
 * configuration.
 */
import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readInt, readNumber, readOptionalString, readString } from "../../src/config/env.js";

const trackedKeys = ["TEST_BOOL", "TEST_NUMBER", "TEST_INT", "TEST_STRING"] as const;
type TrackedKey = (typeof trackedKeys)[number];

const originalEnv = new Map<TrackedKey, string | undefined>();

function setEnv(name: TrackedKey, value: string | undefined): void {
  if (!originalEnv.has(name)) {
    originalEnv.set(name, process.env[name]);
  }
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

describe("config/env helpers", () => {
  afterEach(() => {
    for (const [key, value] of originalEnv) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    originalEnv.clear();
  });

  it("interprets boolean flags case-insensitively", () => {
    setEnv("TEST_BOOL", "YES");
    expect(readBool("TEST_BOOL", false)).to.equal(true);

    setEnv("TEST_BOOL", " Off ");
    expect(readBool("TEST_BOOL", true)).to.equal(false);

    setEnv("TEST_BOOL", "1");
    expect(readBool("TEST_BOOL", false)).to.equal(true);

    setEnv("TEST_BOOL", "  ");
    expect(readBool("TEST_BOOL", true)).to.equal(true);
  });

  it("falls back to the default for ambiguous booleans", () => {
    setEnv("TEST_BOOL", "maybe");
    expect(readBool("TEST_BOOL", true)).to.equal(true);
    expect(readBool("TEST_BOOL", false)).to.equal(false);
  });

  it("parses ratios and enforces bounds", () => {
    setEnv("TEST_NUMBER", "0.65");
    expect(readNumber("TEST_NUMBER", 0.8, { min: 0.01, max: 1 })).to.equal(0.65);

    setEnv("TEST_NUMBER", "1.5");
    expect(readNumber("TEST_NUMBER", 0.8, { min: 0.01, max: 1 })).to.equal(0.8);

    setEnv("TEST_NUMBER", "not-a-number");
    expect(readNumber("TEST_NUMBER", 0.8)).to.equal(0.8);

    setEnv("TEST_NUMBER", "Infinity");
    expect(readNumber("TEST_NUMBER", 0.8)).to.equal(0.8);
  });

  it("reads integers and rejects floats, overflow and out-of-range values", () => {
    setEnv("TEST_INT", " 42 ");
    expect(readInt("TEST_INT", 0)).to.equal(42);

    setEnv("TEST_INT", "-3");
    expect(readInt("TEST_INT", 0)).to.equal(-3);
    expect(readInt("TEST_INT", 7, { min: 0 })).to.equal(7);

    setEnv("TEST_INT", "13.37");
    expect(readInt("TEST_INT", 9)).to.equal(9);

    setEnv("TEST_INT", "17");
    expect(readInt("TEST_INT", 2, { max: 16 })).to.equal(2);

    setEnv("TEST_INT", String(Number.MAX_SAFE_INTEGER + 10));
    expect(readInt("TEST_INT", 9)).to.equal(9);
  });

  it("trims strings and treats blanks as unset", () => {
    setEnv("TEST_STRING", "  https://api.telemetr.test  ");
    expect(readString("TEST_STRING", "fallback")).to.equal("https://api.telemetr.test");

    setEnv("TEST_STRING", "   ");
    expect(readOptionalString("TEST_STRING")).to.equal(undefined);

    setEnv("TEST_STRING", undefined);
    expect(readString("TEST_STRING", "fallback")).to.equal("fallback");
  });
});
