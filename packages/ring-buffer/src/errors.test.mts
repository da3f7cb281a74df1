import { describe, expect, it } from "vitest";

import {
  AllocationError,
  InvalidCapacityError,
  isRingBufferError,
  RingBufferError,
} from "./errors.mjs";

describe("errors", () => {
  it("should carry code and context on InvalidCapacityError", () => {
    const error = new InvalidCapacityError(-3);

    expect(error).toBeInstanceOf(RingBufferError);
    expect(error.name).toBe("InvalidCapacityError");
    expect(error.code).toBe("INVALID_CAPACITY");
    expect(error.context).toEqual({ requested: -3 });
    expect(error.message).toBe(
      "Capacity must be a non-negative integer, got -3",
    );
  });

  it("should keep the underlying failure as cause on AllocationError", () => {
    const cause = new RangeError("Invalid array length");
    const error = new AllocationError(100, 8, cause);

    expect(error.name).toBe("AllocationError");
    expect(error.code).toBe("ALLOCATION_FAILED");
    expect(error.context).toEqual({ requested: 100, current: 8 });
    expect(error.cause).toBe(cause);
    expect(error.message).toBe(
      "Unable to allocate storage for 100 elements (current capacity 8)",
    );
  });

  it("should recognise ring buffer errors", () => {
    expect(isRingBufferError(new InvalidCapacityError(1.5))).toBe(true);
    expect(isRingBufferError(new Error("other"))).toBe(false);
    expect(isRingBufferError("INVALID_CAPACITY")).toBe(false);
  });
});
