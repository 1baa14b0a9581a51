/**
 * NavigationBadge — count or short text shown on a navigation item.
 *
 * Hidden from assistive technology so the link's accessible name stays
 * its label; hosts that want counts announced set accessibleLabel.
 */

import type { BadgeValue } from "@navdock/contracts";
import { cn, formatBadge } from "./utils.js";

interface NavigationBadgeProps {
  badge?: BadgeValue;
  /** Counts above this render as "{max}+" */
  maxCount?: number;
}

export function NavigationBadge({ badge, maxCount = 99 }: NavigationBadgeProps) {
  const text = formatBadge(badge, maxCount);
  if (text === null || !badge) return null;

  return (
    <span
      className={cn("ndk-nav-badge", `ndk-nav-badge--${badge.kind}`)}
      data-badge={text}
      aria-hidden="true"
    >
      {text}
    </span>
  );
}
