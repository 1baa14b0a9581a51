/**
 * Bottom Navigation Hook
 *
 * The render hook that injects the mobile bottom navigation into
 * every page of an enabled panel.
 *
 * Sequence, per request:
 *   1. Find the panel serving the path (no panel → nothing rendered)
 *   2. Log the panel's status at debug level
 *   3. Skip panels with the bottom navigation disabled
 *   4. Resolve the panel's navigation against the path and render it
 */

import type { BottomNavigationRenderer, Logger } from "@navdock/contracts";
import type { NavdockConfig } from "../config/index.js";
import type { PanelRegistry } from "../panels/index.js";
import { resolve } from "../navigation/resolver.js";
import type { RenderHook } from "./index.js";

export interface BottomNavigationHookOptions {
  panels: PanelRegistry;
  /** Turns resolved items into HTML (e.g., renderBottomNavigation from @navdock/ui/server) */
  render: BottomNavigationRenderer;
  logger: Logger;
  config: Pick<NavdockConfig, "navigation">;
}

export function createBottomNavigationHook({
  panels,
  render,
  logger,
  config,
}: BottomNavigationHookOptions): RenderHook {
  const { origin } = config.navigation;

  return ({ path }) => {
    const panel = panels.findByPath(path, origin);
    if (!panel) {
      return "";
    }

    logger.debug(panels.getBottomNavigationStatus(panel.id), { path });

    if (!panels.isBottomNavigationEnabled(panel.id)) {
      return "";
    }

    const items = resolve(panels.getNavigation(panel.id), path, { origin });

    return render(items, {
      ariaLabel: config.navigation.ariaLabel,
      maxBadgeCount: config.navigation.maxBadgeCount,
      panelId: panel.id,
    });
  };
}
