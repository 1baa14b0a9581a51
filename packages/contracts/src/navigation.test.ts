/**
 * Navigation Contracts — Test Suite
 *
 * Validates the descriptor and badge schemas that every host
 * configuration passes through before resolution.
 */

import { describe, it, expect } from "vitest";
import {
  navigationItemDescriptorSchema,
  badgeInputSchema,
  isNavigationGroup,
  textBadge,
  countBadge,
} from "./navigation.js";

describe("badgeInputSchema", () => {
  it("converts a raw number into a count badge", () => {
    expect(badgeInputSchema.parse(5)).toEqual({ kind: "count", value: 5 });
  });

  it("converts a raw string into a text badge", () => {
    expect(badgeInputSchema.parse("new")).toEqual({ kind: "text", value: "new" });
  });

  it("keeps zero and negative counts", () => {
    expect(badgeInputSchema.parse(0)).toEqual(countBadge(0));
    expect(badgeInputSchema.parse(-1)).toEqual(countBadge(-1));
  });

  it("passes the tagged form through", () => {
    expect(badgeInputSchema.parse(textBadge("beta"))).toEqual(textBadge("beta"));
  });

  it("rejects fractional counts", () => {
    expect(badgeInputSchema.safeParse(1.5).success).toBe(false);
  });
});

describe("navigationItemDescriptorSchema: valid input", () => {
  it("accepts the two required fields alone", () => {
    const result = navigationItemDescriptorSchema.parse({
      label: "Dashboard",
      url: "/admin",
    });
    expect(result).toStrictEqual({ label: "Dashboard", url: "/admin" });
  });

  it("keeps every optional field when provided", () => {
    const result = navigationItemDescriptorSchema.parse({
      label: "Docs",
      url: "https://docs.example.test",
      icon: "book",
      badge: 3,
      sortOrder: 4,
      accessibleLabel: "Documentation (opens in a new tab)",
      openInNewTab: true,
    });
    expect(result).toStrictEqual({
      label: "Docs",
      url: "https://docs.example.test",
      icon: "book",
      badge: { kind: "count", value: 3 },
      sortOrder: 4,
      accessibleLabel: "Documentation (opens in a new tab)",
      openInNewTab: true,
    });
  });

  it("drops null optional fields", () => {
    const result = navigationItemDescriptorSchema.parse({
      label: "Users",
      url: "/admin/users",
      icon: null,
      badge: null,
      sortOrder: null,
    });
    expect(result).toStrictEqual({ label: "Users", url: "/admin/users" });
  });

  it("keeps special characters and unicode in labels untouched", () => {
    const result = navigationItemDescriptorSchema.parse({
      label: "Orders & <Returns> 🏠",
      url: "/admin/orders",
    });
    expect(result.label).toBe("Orders & <Returns> 🏠");
  });

  it("accepts negative sort orders", () => {
    const result = navigationItemDescriptorSchema.parse({
      label: "Pinned",
      url: "/admin/pinned",
      sortOrder: -10,
    });
    expect(result.sortOrder).toBe(-10);
  });
});

describe("navigationItemDescriptorSchema: invalid input", () => {
  it("rejects a missing label", () => {
    const result = navigationItemDescriptorSchema.safeParse({ url: "/x" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["label"]);
      expect(result.error.issues[0].message).toBe("label is required");
    }
  });

  it("rejects a missing url", () => {
    const result = navigationItemDescriptorSchema.safeParse({ label: "Home" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["url"]);
    }
  });

  it("rejects a whitespace-only label", () => {
    const result = navigationItemDescriptorSchema.safeParse({
      label: "   ",
      url: "/x",
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("label must not be empty");
    }
  });

  it("rejects a non-string icon", () => {
    const result = navigationItemDescriptorSchema.safeParse({
      label: "Home",
      url: "/",
      icon: 42,
    });
    expect(result.success).toBe(false);
  });
});

describe("isNavigationGroup", () => {
  it("recognizes groups", () => {
    expect(isNavigationGroup({ label: "Shop", items: [] })).toBe(true);
  });

  it("treats descriptors as loose items", () => {
    expect(isNavigationGroup({ label: "Home", url: "/" })).toBe(false);
  });
});
