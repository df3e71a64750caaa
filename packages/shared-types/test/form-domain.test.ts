import { describe, expect, it } from "vitest";
import { ConfigurationError, hasAnyKey, isFormInput, isUnset, resolveDefault, UNSET, ValueError } from "../src";

describe("defaults", () => {
  it("calls factories and returns plain values as they are", () => {
    expect(resolveDefault(() => ["fresh"])).toEqual(["fresh"]);
    expect(resolveDefault("plain")).toBe("plain");
    expect(resolveDefault(null)).toBeNull();
  });

  it("recognises only the unset sentinel", () => {
    expect(isUnset(UNSET)).toBe(true);
    expect(isUnset(undefined)).toBe(false);
    expect(isUnset(null)).toBe(false);
  });
});

describe("form input", () => {
  it("accepts URLSearchParams as multi-valued input", () => {
    const params = new URLSearchParams("a=1&a=2");

    expect(isFormInput(params)).toBe(true);
    expect(hasAnyKey(params)).toBe(true);
    expect(hasAnyKey(new URLSearchParams())).toBe(false);
  });

  it("rejects plain records and primitives", () => {
    expect(isFormInput({ a: "1" })).toBe(false);
    expect(isFormInput("a=1")).toBe(false);
    expect(isFormInput(null)).toBe(false);
  });
});

describe("errors", () => {
  it("names its error classes", () => {
    expect(new ConfigurationError("bad option").name).toBe("ConfigurationError");
    expect(new ValueError("bad value")).toBeInstanceOf(Error);
  });
});
