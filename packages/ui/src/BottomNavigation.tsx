/**
 * BottomNavigation — mobile bottom tab bar.
 *
 * Renders resolved navigation items as a landmark with a list of links.
 *
 * Accessibility contract:
 *   - <nav> landmark with a descriptive aria-label
 *   - at most one link with aria-current="page" (the active item)
 *   - icons and badges hidden from the accessibility tree, so each
 *     link's accessible name is its label (or accessibleLabel)
 *
 * Layout, breakpoints, and theming live in styles/bottom-navigation.css.
 * Keyboard arrow/Home/End support is added client-side by keyboard.ts.
 */

import type {
  BottomNavigationRenderOptions,
  ResolvedNavigationItem,
} from "@navdock/contracts";
import { NavigationBadge } from "./NavigationBadge.js";
import { NavigationIcon } from "./NavigationIcon.js";
import { cn } from "./utils.js";

export const DEFAULT_NAV_LABEL = "Mobile bottom navigation";

export interface BottomNavigationProps extends BottomNavigationRenderOptions {
  items: ResolvedNavigationItem[];
}

interface NavigationLinkProps {
  item: ResolvedNavigationItem;
  maxBadgeCount: number;
}

function NavigationLink({ item, maxBadgeCount }: NavigationLinkProps) {
  return (
    <a
      href={item.url}
      className={cn("ndk-nav-item", item.isActive && "ndk-nav-item--active")}
      aria-current={item.isActive ? "page" : undefined}
      aria-label={item.accessibleLabel}
      target={item.openInNewTab ? "_blank" : undefined}
      rel={item.openInNewTab ? "noopener noreferrer" : undefined}
    >
      {item.icon ? <NavigationIcon name={item.icon} /> : null}
      <span className="ndk-nav-label">{item.label}</span>
      <NavigationBadge badge={item.badge} maxCount={maxBadgeCount} />
    </a>
  );
}

export function BottomNavigation({
  items,
  ariaLabel = DEFAULT_NAV_LABEL,
  maxBadgeCount = 99,
  panelId,
  className,
}: BottomNavigationProps) {
  return (
    <nav
      className={cn("ndk-bottom-nav", className)}
      role="navigation"
      aria-label={ariaLabel}
      data-mobile-nav=""
      data-panel={panelId}
    >
      <ul className="ndk-nav-list" role="list">
        {items.map((item, index) => (
          // Labels may repeat; position + url is unique within one render
          <li key={`${index}:${item.url}`} className="ndk-nav-list-item">
            <NavigationLink item={item} maxBadgeCount={maxBadgeCount} />
          </li>
        ))}
      </ul>
    </nav>
  );
}
