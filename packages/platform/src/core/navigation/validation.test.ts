/**
 * Descriptor Validation — Test Suite
 *
 * Validates that validateDescriptor():
 *   - Returns normalized copies for valid input
 *   - Rejects missing or blank label/url with structured field errors
 *   - Names the offending item by index and label
 */

import { describe, it, expect } from "vitest";
import {
  validateDescriptor,
  validateDescriptors,
  InvalidDescriptorError,
} from "./validation.js";

function captureError(fn: () => unknown): InvalidDescriptorError {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidDescriptorError) return err;
    throw err;
  }
  throw new Error("expected InvalidDescriptorError");
}

describe("validateDescriptor: valid input", () => {
  it("returns a copy, not the input object", () => {
    const input = { label: "Home", url: "/" };
    const result = validateDescriptor(input);
    expect(result).toEqual(input);
    expect(result).not.toBe(input);
  });

  it("converts raw badge values into the tagged form", () => {
    expect(validateDescriptor({ label: "Inbox", url: "/inbox", badge: "5" }).badge).toEqual({
      kind: "text",
      value: "5",
    });
  });
});

describe("validateDescriptor: invalid input", () => {
  it("rejects a descriptor without a label", () => {
    const err = captureError(() => validateDescriptor({ url: "/x" }));
    expect(err.message).toBe("Invalid navigation item at index 0: label is required");
    expect(err.fieldErrors).toEqual([
      { field: "label", message: "label is required", code: "invalid_type" },
    ]);
    expect(err.label).toBeUndefined();
  });

  it("names the item by label when the url is missing", () => {
    const err = captureError(() => validateDescriptor({ label: "Reports" }, 3));
    expect(err.message).toBe(
      'Invalid navigation item at index 3 ("Reports"): url is required'
    );
    expect(err.index).toBe(3);
    expect(err.label).toBe("Reports");
  });

  it("lists every problem with the item", () => {
    const err = captureError(() => validateDescriptor({ label: " ", url: "" }));
    expect(err.fieldErrors.map((e) => e.field)).toEqual(["label", "url"]);
    expect(err.message).toBe(
      "Invalid navigation item at index 0: label must not be empty; url must not be empty"
    );
  });

  it("rejects values that are not objects", () => {
    expect(() => validateDescriptor(null)).toThrow(InvalidDescriptorError);
    expect(() => validateDescriptor("Home")).toThrow(InvalidDescriptorError);
  });

  it("has a stable name for logging", () => {
    const err = captureError(() => validateDescriptor({}));
    expect(err.name).toBe("InvalidDescriptorError");
    expect(err).toBeInstanceOf(Error);
  });
});

describe("validateDescriptors", () => {
  it("reports the index of the first invalid item", () => {
    const err = captureError(() =>
      validateDescriptors([
        { label: "Home", url: "/" },
        { label: "Users", url: "/users" },
        { label: "Broken" },
      ])
    );
    expect(err.index).toBe(2);
  });
});
