/**
 * Panel Definition
 *
 * A panel is one admin area of the host application (e.g., "/admin"
 * for staff, "/app" for customers). Each panel owns its navigation and
 * decides whether the mobile bottom navigation is shown.
 */

import type { NavigationEntry } from "./navigation.js";

/**
 * Navigation for a panel. A function is evaluated once per request,
 * so badges and permissions can reflect the current state.
 */
export type NavigationSource = NavigationEntry[] | (() => NavigationEntry[]);

/**
 * Whether the bottom navigation is shown for a panel.
 * A function is evaluated on every render.
 */
export type BottomNavigationCondition = boolean | (() => boolean);

export interface PanelDefinition {
  /** Unique panel ID (e.g., "admin") */
  id: string;

  /** URL prefix the panel is served under (e.g., "/admin") */
  path: string;

  /** Human-readable name, used in page titles */
  label?: string;

  navigation: NavigationSource;

  /** Defaults to enabled */
  bottomNavigation?: BottomNavigationCondition;
}
