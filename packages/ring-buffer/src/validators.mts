/**
 * Option validation for the ring buffer constructor
 */

import { InvalidCapacityError } from "./errors.mjs";

/**
 * Validates constructor options with consistent error messages
 * and assertion signatures for type narrowing
 */
export class ConstructorValidator {
  constructor(private readonly componentName: string) {}

  /**
   * Validates that an optional value is a function when present
   * Throws TypeError otherwise
   */
  optionalFunction(
    field: string,
    value: unknown,
  ): asserts value is ((...args: never[]) => unknown) | undefined {
    if (value !== undefined && typeof value !== "function") {
      throw new TypeError(
        `[${this.componentName}] ${field} must be a function, got ${typeof value}`,
      );
    }
  }

  /**
   * Validates that an optional value is a non-empty string when present
   * Throws TypeError otherwise
   */
  optionalNonEmptyString(
    field: string,
    value: unknown,
  ): asserts value is string | undefined {
    if (
      value !== undefined &&
      (typeof value !== "string" || value.trim() === "")
    ) {
      throw new TypeError(
        `[${this.componentName}] ${field} must be a non-empty string, got ${typeof value}`,
      );
    }
  }

  /**
   * Validates that an optional value exposes the given logger methods
   * Throws TypeError when any is missing
   */
  optionalLogger(
    field: string,
    value: unknown,
    methods: readonly string[],
  ): void {
    if (value === undefined) {
      return;
    }
    if (typeof value !== "object" || value === null) {
      throw new TypeError(
        `[${this.componentName}] ${field} must be an object, got ${value === null ? "null" : typeof value}`,
      );
    }
    for (const method of methods) {
      if (typeof Reflect.get(value, method) !== "function") {
        throw new TypeError(
          `[${this.componentName}] ${field}.${method} must be a function`,
        );
      }
    }
  }
}

/**
 * Validates a capacity request
 * Throws InvalidCapacityError when it is not a non-negative integer
 */
export function assertCapacity(value: unknown): asserts value is number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new InvalidCapacityError(value);
  }
}
