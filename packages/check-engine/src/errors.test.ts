import { describe, it, expect } from "vitest";
import {
  AttributeResolutionError,
  ConnectionError,
  ConnectionTimeoutError,
  ResultKeyError,
  describeError,
  isDisconnectError,
} from "./errors";

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("isDisconnectError", () => {
  it("accepts connection timeouts and refused connections", () => {
    expect(isDisconnectError(new ConnectionTimeoutError("timed out"))).toBe(true);
    expect(isDisconnectError(new ConnectionError("refused", { cause: new Error("channel not found") }))).toBe(true);
  });

  it("accepts timeout and abort errors by name", () => {
    const timeout = new Error("t");
    timeout.name = "TimeoutError";
    const abort = new Error("a");
    abort.name = "AbortError";
    expect(isDisconnectError(timeout)).toBe(true);
    expect(isDisconnectError(abort)).toBe(true);
  });

  it("accepts socket error codes", () => {
    expect(isDisconnectError(withCode("refused", "ECONNREFUSED"))).toBe(true);
    expect(isDisconnectError(withCode("reset", "ECONNRESET"))).toBe(true);
    expect(isDisconnectError(withCode("no such file", "ENOENT"))).toBe(false);
  });

  it("rejects ordinary errors and non-errors", () => {
    expect(isDisconnectError(new TypeError("x"))).toBe(false);
    expect(isDisconnectError(new AttributeResolutionError("x"))).toBe(false);
    expect(isDisconnectError("ECONNREFUSED")).toBe(false);
    expect(isDisconnectError(undefined)).toBe(false);
  });
});

describe("ResultKeyError", () => {
  it("carries the key", () => {
    const err = new ResultKeyError("times.a", "missing");
    expect(err.key).toBe("times.a");
    expect(err.name).toBe("ResultKeyError");
  });
});

describe("describeError", () => {
  it("renders class and message", () => {
    expect(describeError(new AttributeResolutionError("no attr"))).toBe("AttributeResolutionError: no attr");
    expect(describeError(42)).toBe("Error: 42");
  });
});
