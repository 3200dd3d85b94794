/**
 * Tests for error-utils.ts
 */

import { describe, it, expect } from "@jest/globals";
import {
  getErrorMessage,
  isAlreadyExistsError,
  isNotFoundError,
  isPermissionError,
} from "../error-utils.js";

describe("isNotFoundError", () => {
  it("returns true for ENOENT errors", () => {
    const err = Object.assign(new Error("spawn uv ENOENT"), { code: "ENOENT" });
    expect(isNotFoundError(err)).toBe(true);
  });

  it("returns false for other error codes", () => {
    const err = Object.assign(new Error("denied"), { code: "EACCES" });
    expect(isNotFoundError(err)).toBe(false);
  });

  it("returns false for null, undefined and strings", () => {
    expect(isNotFoundError(null)).toBe(false);
    expect(isNotFoundError(undefined)).toBe(false);
    expect(isNotFoundError("ENOENT")).toBe(false);
  });

  it("ignores non-string codes", () => {
    expect(isNotFoundError({ code: 2 })).toBe(false);
  });
});

describe("isPermissionError", () => {
  it("matches EACCES and EPERM", () => {
    expect(isPermissionError({ code: "EACCES" })).toBe(true);
    expect(isPermissionError({ code: "EPERM" })).toBe(true);
  });

  it("does not match ENOENT", () => {
    expect(isPermissionError({ code: "ENOENT" })).toBe(false);
  });
});

describe("isAlreadyExistsError", () => {
  it("matches EEXIST only", () => {
    expect(isAlreadyExistsError({ code: "EEXIST" })).toBe(true);
    expect(isAlreadyExistsError({ code: "ENOENT" })).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("extracts message from Error instances", () => {
    expect(getErrorMessage(new Error("something broke"))).toBe("something broke");
  });

  it("returns strings as-is", () => {
    expect(getErrorMessage("raw string error")).toBe("raw string error");
  });

  it("converts other values with String()", () => {
    expect(getErrorMessage(42)).toBe("42");
    expect(getErrorMessage(null)).toBe("null");
    expect(getErrorMessage({ key: "value" })).toBe("[object Object]");
  });
});
