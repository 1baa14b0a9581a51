/**
 * Shared Utility Functions
 *
 * Building blocks for the navigation components.
 */

import { clsx, type ClassValue } from "clsx";
import { twMerge } from "tailwind-merge";
import type { BadgeValue } from "@navdock/contracts";

/**
 * Merge class names with conflict resolution.
 * Combines clsx (conditional classes) with tailwind-merge (deduplication),
 * so host utility classes passed via className override cleanly.
 *
 * @example
 * cn("ndk-nav-item", isActive && "ndk-nav-item--active")
 * // → "ndk-nav-item ndk-nav-item--active"
 */
export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs));
}

/**
 * Text shown inside a badge, or null when nothing should render.
 *
 * 5 → "5", 150 → "99+", 0 → null, "new" → "new", "" → null
 */
export function formatBadge(
  badge: BadgeValue | undefined,
  maxCount = 99
): string | null {
  if (!badge) return null;

  switch (badge.kind) {
    case "count":
      // Nothing to count: the badge disappears
      if (badge.value <= 0) return null;
      return badge.value > maxCount ? `${maxCount}+` : String(badge.value);
    case "text":
      return badge.value.trim() === "" ? null : badge.value;
  }
}
