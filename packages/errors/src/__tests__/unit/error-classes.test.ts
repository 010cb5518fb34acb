import { describe, expect, it } from "vitest";
import {
  ConflictError,
  getErrorMessage,
  HashrouteError,
  hasCode,
  InternalError,
  isConflictError,
  isError,
  isExpectedError,
  isHashrouteError,
  isInternalError,
  isValidationError,
  ValidationError,
  wrapError,
} from "../../index.js";

describe("HashrouteError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(HashrouteError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.httpStatus).toBe(500);
    expect(error.grpcCode).toBe("INTERNAL");
    expect(error.domain).toBe("internal");
    expect(error.isExpected).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should preserve stack traces", () => {
    const error = new InternalError("Stack test");
    expect(error.stack).toBeDefined();
    expect(error.stack).toContain("InternalError");
  });

  it("should support metadata and trace ID", () => {
    const error = new InternalError("With metadata", { rule: "r1" }, "trace-abc-123");

    expect(error.metadata).toEqual({ rule: "r1" });
    expect(error.traceId).toBe("trace-abc-123");
  });

  it("should serialize to JSON", () => {
    const error = new InternalError("JSON test", { key: "value" }, "trace-123");
    const json = error.toJSON();

    expect(json).toMatchObject({
      _tag: "InternalError",
      name: "InternalError",
      code: "INTERNAL_ERROR",
      message: "JSON test",
      domain: "internal",
      httpStatus: 500,
      grpcCode: "INTERNAL",
      isExpected: false,
      metadata: { key: "value" },
      traceId: "trace-123",
    });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
    expect(json.stack).toBeDefined();
  });

  it("should convert to string with metadata and trace", () => {
    const error = new InternalError("String test", { key: "value" }, "trace-123");

    expect(error.toString()).toBe(
      'InternalError [INTERNAL_ERROR]: String test {"key":"value"} [trace: trace-123]',
    );
  });

  it("should omit empty metadata from string form", () => {
    const error = new InternalError("Plain", {});
    expect(error.toString()).toBe("InternalError [INTERNAL_ERROR]: Plain");
  });
});

describe("base error types", () => {
  it("ValidationError defaults to VALIDATION_FAILED with issues", () => {
    const error = new ValidationError("bad", [
      { field: "suffix", message: "Required", code: "invalid_type" },
    ]);

    expect(error.code).toBe("VALIDATION_FAILED");
    expect(error.httpStatus).toBe(400);
    expect(error.isExpected).toBe(true);
    expect(error.issues).toHaveLength(1);
  });

  it("ValidationError accepts a catalog code and cause", () => {
    const cause = new Error("root");
    const error = new ValidationError({
      code: "REMAP_INVALID_REQUEST_STATE",
      message: "no request",
      cause,
    });

    expect(error.code).toBe("REMAP_INVALID_REQUEST_STATE");
    expect(error.grpcCode).toBe("FAILED_PRECONDITION");
    expect(error.cause).toBe(cause);
    expect(error.issues).toEqual([]);
  });

  it("ConflictError defaults to STATE_CONFLICT", () => {
    const error = new ConflictError("busy");

    expect(error.code).toBe("STATE_CONFLICT");
    expect(error.httpStatus).toBe(409);
    expect(error.grpcCode).toBe("ABORTED");
  });
});

describe("guards", () => {
  it("discriminate base types", () => {
    const validation = new ValidationError("v");
    const conflict = new ConflictError("c");
    const internal = new InternalError("i");

    expect(isValidationError(validation)).toBe(true);
    expect(isValidationError(conflict)).toBe(false);
    expect(isConflictError(conflict)).toBe(true);
    expect(isInternalError(internal)).toBe(true);
    expect(isInternalError(new Error("plain"))).toBe(false);
  });

  it("isHashrouteError and isError", () => {
    expect(isHashrouteError(new InternalError("x"))).toBe(true);
    expect(isHashrouteError(new Error("x"))).toBe(false);
    expect(isError(new Error("x"))).toBe(true);
    expect(isError("x")).toBe(false);
  });

  it("hasCode narrows on code", () => {
    const error = new ConflictError("c");
    expect(hasCode(error, "STATE_CONFLICT")).toBe(true);
    expect(hasCode(error, "INTERNAL_ERROR")).toBe(false);
  });

  it("isExpectedError follows the catalog", () => {
    expect(isExpectedError(new ValidationError("v"))).toBe(true);
    expect(isExpectedError(new InternalError("i"))).toBe(false);
    expect(isExpectedError(new Error("plain"))).toBe(false);
    expect(isExpectedError(null)).toBe(false);
  });
});

describe("wrapError / getErrorMessage", () => {
  it("returns HashrouteError as-is", () => {
    const error = new ConflictError("c");
    expect(wrapError(error)).toBe(error);
  });

  it("wraps a plain Error in InternalError", () => {
    const wrapped = wrapError(new TypeError("boom"), "trace-1");

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
    expect(wrapped.traceId).toBe("trace-1");
  });

  it("wraps strings and unknown values", () => {
    expect(wrapError("text").message).toBe("text");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });

  it("getErrorMessage handles every shape", () => {
    expect(getErrorMessage(new Error("m"))).toBe("m");
    expect(getErrorMessage("s")).toBe("s");
    expect(getErrorMessage({})).toBe("An unknown error occurred");
  });
});
