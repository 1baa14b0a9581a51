/**
 * Descriptor Validation
 *
 * Checks every navigation item against the contracts schema BEFORE
 * resolution. An item without a label or URL is never rendered with
 * blank fields; the whole resolution fails instead.
 */

import {
  navigationItemDescriptorSchema,
  type NavigationItemDescriptor,
} from "@navdock/contracts";

export interface DescriptorFieldError {
  field: string;
  message: string;
  code: string;
}

/**
 * Raised when a navigation item is missing its label or URL,
 * or carries a wrongly typed optional field.
 */
export class InvalidDescriptorError extends Error {
  public readonly code = "INVALID_DESCRIPTOR";
  /** Position of the offending item in the input list */
  public readonly index: number;
  /** The item's label, when it had a usable one */
  public readonly label: string | undefined;
  public readonly fieldErrors: DescriptorFieldError[];

  constructor(
    message: string,
    index: number,
    fieldErrors: DescriptorFieldError[],
    label?: string
  ) {
    super(message);
    this.name = "InvalidDescriptorError";
    this.index = index;
    this.label = label;
    this.fieldErrors = fieldErrors;
  }
}

function labelOf(value: unknown): string | undefined {
  if (
    typeof value === "object" &&
    value !== null &&
    "label" in value &&
    typeof value.label === "string" &&
    value.label.trim() !== ""
  ) {
    return value.label;
  }
  return undefined;
}

/**
 * Validates a single raw descriptor.
 * Returns a new, normalized descriptor; the input is left untouched.
 */
export function validateDescriptor(
  value: unknown,
  index = 0
): NavigationItemDescriptor {
  const result = navigationItemDescriptorSchema.safeParse(value);

  if (!result.success) {
    const fieldErrors = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    const label = labelOf(value);
    const subject = label ? `index ${index} ("${label}")` : `index ${index}`;

    throw new InvalidDescriptorError(
      `Invalid navigation item at ${subject}: ${fieldErrors.map((e) => e.message).join("; ")}`,
      index,
      fieldErrors,
      label
    );
  }

  return result.data;
}

/**
 * Validates a whole list. Fails on the first invalid item.
 */
export function validateDescriptors(
  values: readonly unknown[]
): NavigationItemDescriptor[] {
  return values.map((value, index) => validateDescriptor(value, index));
}
