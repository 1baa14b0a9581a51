/**
 * Panel Registry
 *
 * Holds the host's admin panels and whether each one shows the
 * mobile bottom navigation. Zero-config by default: a panel shows it
 * unless told otherwise.
 *
 * Usage:
 *   const panels = new PanelRegistry();
 *   panels.register({ id: "admin", path: "/admin", navigation: adminNav });
 *   panels.setBottomNavigation("admin", false);            // disable
 *   panels.setBottomNavigation("admin", () => isMobile());  // conditional
 *
 * The registry is an instance the host owns and passes around;
 * there is no process-wide registry.
 */

import type {
  BottomNavigationCondition,
  NavigationItemInput,
  PanelDefinition,
} from "@navdock/contracts";
import { flattenNavigation } from "../navigation/resolver.js";
import { normalizePath } from "../navigation/paths.js";

function segmentsOf(path: string, origin?: string): string[] {
  return normalizePath(path, origin).split("/").filter(Boolean);
}

function isPrefix(prefix: string[], path: string[]): boolean {
  return prefix.length <= path.length && prefix.every((segment, i) => path[i] === segment);
}

export class PanelRegistry {
  /** Registered panels, keyed by panel ID */
  private readonly panels = new Map<string, PanelDefinition>();

  /**
   * Registers a panel. Throws if a panel with the same ID already exists.
   */
  register(panel: PanelDefinition): this {
    if (this.panels.has(panel.id)) {
      throw new Error(
        `Panel "${panel.id}" is already registered. Panel IDs must be unique.`
      );
    }
    this.panels.set(panel.id, { ...panel });
    return this;
  }

  get(id: string): PanelDefinition | undefined {
    return this.panels.get(id);
  }

  all(): PanelDefinition[] {
    return Array.from(this.panels.values());
  }

  /**
   * Finds the panel serving a request path.
   * The panel with the longest matching path prefix wins, compared by
   * whole segments ("/administrator" is not under "/admin").
   * Absolute URLs on `origin` are reduced to their path first.
   */
  findByPath(path: string, origin?: string): PanelDefinition | undefined {
    const requested = segmentsOf(path, origin);
    let best: { panel: PanelDefinition; depth: number } | undefined;

    for (const panel of this.panels.values()) {
      const prefix = segmentsOf(panel.path);
      if (isPrefix(prefix, requested) && (!best || prefix.length > best.depth)) {
        best = { panel, depth: prefix.length };
      }
    }
    return best?.panel;
  }

  /**
   * Enables, disables, or conditionally enables the bottom navigation
   * for one panel. Called with no condition, it enables it.
   */
  setBottomNavigation(id: string, condition: BottomNavigationCondition = true): this {
    const panel = this.require(id);
    this.panels.set(id, { ...panel, bottomNavigation: condition });
    return this;
  }

  /**
   * Whether the panel shows the bottom navigation.
   * Conditions are evaluated on every call.
   */
  isBottomNavigationEnabled(id: string): boolean {
    const condition = this.require(id).bottomNavigation ?? true;
    return typeof condition === "function" ? condition() : condition;
  }

  /**
   * Human-readable status line for debug logging.
   */
  getBottomNavigationStatus(id: string): string {
    const status = this.isBottomNavigationEnabled(id) ? "ACTIVE" : "DISABLED";
    return `Mobile Bottom Navigation [${id}]: ${status}`;
  }

  /**
   * Evaluates the panel's navigation for the current request and
   * flattens any groups.
   */
  getNavigation(id: string): NavigationItemInput[] {
    const source = this.require(id).navigation;
    const entries = typeof source === "function" ? source() : source;
    return flattenNavigation(entries);
  }

  private require(id: string): PanelDefinition {
    const panel = this.panels.get(id);
    if (!panel) {
      throw new Error(`Panel "${id}" is not registered.`);
    }
    return panel;
  }
}
