/**
 * Bootstrap
 *
 * Wires the platform engine with the UI renderer.
 * This is the SINGLE place where platform meets ui.
 *
 * Sequence:
 *   1. Take the loaded config and the host's panels
 *   2. Register the bottom navigation at the "body.end" render hook
 *   3. Return everything the HTTP layer needs
 */

import type { Logger } from "@navdock/contracts";
import {
  createBottomNavigationHook,
  createLogger,
  RenderHookRegistry,
  type NavdockConfig,
  type PanelRegistry,
} from "@navdock/platform";
import { renderBottomNavigation } from "@navdock/ui/server";
import { createDemoPanels } from "./panels.js";

export interface AppContext {
  config: NavdockConfig;
  panels: PanelRegistry;
  hooks: RenderHookRegistry;
  logger: Logger;
}

export function bootstrap(
  config: NavdockConfig,
  panels: PanelRegistry = createDemoPanels()
): AppContext {
  const logger = createLogger("demo");

  const hooks = new RenderHookRegistry().register(
    "body.end",
    createBottomNavigationHook({ panels, render: renderBottomNavigation, logger, config })
  );

  for (const panel of panels.all()) {
    logger.info(panels.getBottomNavigationStatus(panel.id), { path: panel.path });
  }

  return { config, panels, hooks, logger };
}
