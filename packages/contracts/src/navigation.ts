/**
 * Navigation Definition
 *
 * Describes the entries of the mobile bottom navigation.
 * The host supplies descriptors (usually the same list that feeds its
 * sidebar), the platform resolves them against the current request,
 * and the UI renders the resolved list.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Badge
// ---------------------------------------------------------------------------

/**
 * A badge shown on a navigation item.
 * Absence (no badge) is represented by `undefined`, never by a third kind.
 */
export type BadgeValue =
  | { kind: "text"; value: string }
  | { kind: "count"; value: number };

/** Builds a text badge (e.g., "new") */
export function textBadge(value: string): BadgeValue {
  return { kind: "text", value };
}

/** Builds a count badge (e.g., unread items) */
export function countBadge(value: number): BadgeValue {
  return { kind: "count", value };
}

export const badgeValueSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), value: z.string() }),
  z.object({ kind: z.literal("count"), value: z.number().int() }),
]);

/**
 * Accepts the tagged form or the raw string/number a host config usually
 * carries, and always yields the tagged form.
 */
export const badgeInputSchema = z.union([
  badgeValueSchema,
  z.string().transform((value): BadgeValue => textBadge(value)),
  z.number().int().transform((value): BadgeValue => countBadge(value)),
]);

// ---------------------------------------------------------------------------
// Descriptor
// ---------------------------------------------------------------------------

/**
 * A single entry in the bottom navigation, after validation.
 */
export interface NavigationItemDescriptor {
  /** Display label (e.g., "Users"). Also the link's accessible name. */
  label: string;

  /** Link target: a path ("/admin/users") or an absolute URL */
  url: string;

  /** Icon identifier (e.g., "users"). Unknown names fall back to a generic glyph. */
  icon?: string;

  badge?: BadgeValue;

  /** Position in the bar (lower = further left). Unsorted items go last. */
  sortOrder?: number;

  /** Overrides the accessible name when the visible label is too terse */
  accessibleLabel?: string;

  /** Open in a new tab (for external links) */
  openInNewTab?: boolean;
}

/**
 * A descriptor annotated with its active state for the current request.
 */
export interface ResolvedNavigationItem extends NavigationItemDescriptor {
  /** True for at most one item in a resolved list */
  isActive: boolean;
}

function requiredText(field: string) {
  return z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .refine((value) => value.trim().length > 0, {
      message: `${field} must not be empty`,
    });
}

/**
 * Validates a raw descriptor from host configuration.
 * Optional fields may be missing or null; both mean "not set".
 */
export const navigationItemDescriptorSchema = z
  .object({
    label: requiredText("label"),
    url: requiredText("url"),
    icon: z.string().nullish(),
    badge: badgeInputSchema.nullish(),
    sortOrder: z.number().int().nullish(),
    accessibleLabel: z.string().nullish(),
    openInNewTab: z.boolean().nullish(),
  })
  .transform((item): NavigationItemDescriptor => {
    const descriptor: NavigationItemDescriptor = {
      label: item.label,
      url: item.url,
    };
    if (item.icon != null) descriptor.icon = item.icon;
    if (item.badge != null) descriptor.badge = item.badge;
    if (item.sortOrder != null) descriptor.sortOrder = item.sortOrder;
    if (item.accessibleLabel != null) descriptor.accessibleLabel = item.accessibleLabel;
    if (item.openInNewTab != null) descriptor.openInNewTab = item.openInNewTab;
    return descriptor;
  });

/**
 * What a host may hand over before validation: badges as raw
 * strings/numbers, nulls for unset fields.
 */
export type NavigationItemInput = z.input<typeof navigationItemDescriptorSchema>;

// ---------------------------------------------------------------------------
// Groups
// ---------------------------------------------------------------------------

/**
 * A titled group of items. The bottom bar has no room for group headings,
 * so groups are flattened in order.
 */
export interface NavigationGroup {
  label?: string;
  items: NavigationItemInput[];
}

/** One entry of a panel's navigation: a loose item or a group */
export type NavigationEntry = NavigationItemInput | NavigationGroup;

export function isNavigationGroup(entry: NavigationEntry): entry is NavigationGroup {
  return "items" in entry && Array.isArray(entry.items);
}

// ---------------------------------------------------------------------------
// Rendering boundary
// ---------------------------------------------------------------------------

/** Options the renderer accepts alongside the resolved items */
export interface BottomNavigationRenderOptions {
  /** Accessible name of the landmark (default "Mobile bottom navigation") */
  ariaLabel?: string;

  /** Counts above this render as "{max}+" (default 99) */
  maxBadgeCount?: number;

  /** Emitted as data-panel on the nav element */
  panelId?: string;

  /** Extra classes for the nav element */
  className?: string;
}

/**
 * Turns resolved items into an HTML fragment.
 * The platform calls this without knowing which UI library produced it.
 */
export type BottomNavigationRenderer = (
  items: ResolvedNavigationItem[],
  options: BottomNavigationRenderOptions
) => string;
