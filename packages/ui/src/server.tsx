/**
 * Server rendering entry — @navdock/ui/server
 *
 * Produces the bottom navigation as a static HTML fragment for hosts
 * that render pages on the server, plus the stylesheet location.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { renderToStaticMarkup } from "react-dom/server";
import type { BottomNavigationRenderer } from "@navdock/contracts";
import { BottomNavigation } from "./BottomNavigation.js";

/**
 * Renders resolved items to an HTML string.
 * Matches the BottomNavigationRenderer contract the platform hook expects.
 */
export const renderBottomNavigation: BottomNavigationRenderer = (items, options) =>
  renderToStaticMarkup(<BottomNavigation items={items} {...options} />);

/** Absolute path of the stylesheet, for hosts that serve it themselves */
export const bottomNavigationStylesheetPath = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "styles",
  "bottom-navigation.css"
);
