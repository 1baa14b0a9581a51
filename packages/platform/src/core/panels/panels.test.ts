/**
 * Panel Registry — Test Suite
 *
 * Validates panel lookup by path, per-panel enablement of the
 * bottom navigation (boolean and condition), status strings,
 * and per-request evaluation of navigation sources.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { PanelDefinition } from "@navdock/contracts";
import { PanelRegistry } from "./index.js";

function panel(overrides: Partial<PanelDefinition> & { id: string }): PanelDefinition {
  return {
    path: `/${overrides.id}`,
    navigation: [],
    ...overrides,
  };
}

describe("PanelRegistry", () => {
  let panels: PanelRegistry;

  beforeEach(() => {
    panels = new PanelRegistry();
  });

  describe("register()", () => {
    it("stores panels by id", () => {
      panels.register(panel({ id: "admin" }));
      expect(panels.get("admin")?.path).toBe("/admin");
      expect(panels.all()).toHaveLength(1);
    });

    it("throws on a duplicate id", () => {
      panels.register(panel({ id: "admin" }));
      expect(() => panels.register(panel({ id: "admin" }))).toThrow(
        'Panel "admin" is already registered. Panel IDs must be unique.'
      );
    });

    it("does not keep a reference to the caller's object", () => {
      const definition = panel({ id: "admin" });
      panels.register(definition);
      panels.setBottomNavigation("admin", false);
      expect(definition.bottomNavigation).toBeUndefined();
    });
  });

  describe("findByPath()", () => {
    beforeEach(() => {
      panels
        .register(panel({ id: "root", path: "/" }))
        .register(panel({ id: "admin", path: "/admin" }))
        .register(panel({ id: "billing", path: "/admin/billing/" }));
    });

    it("returns the panel with the longest matching prefix", () => {
      expect(panels.findByPath("/admin/billing/invoices")?.id).toBe("billing");
      expect(panels.findByPath("/admin/users")?.id).toBe("admin");
      expect(panels.findByPath("/admin")?.id).toBe("admin");
    });

    it("compares whole segments", () => {
      expect(panels.findByPath("/administrator")?.id).toBe("root");
    });

    it("ignores query strings", () => {
      expect(panels.findByPath("/admin/billing?tab=open")?.id).toBe("billing");
    });

    it("reduces absolute urls on the given origin to their path", () => {
      expect(
        panels.findByPath("https://app.example.test/admin/billing/x", "https://app.example.test")?.id
      ).toBe("billing");
    });

    it("does not treat absolute urls on another origin as local paths", () => {
      const only = new PanelRegistry().register(panel({ id: "admin", path: "/admin" }));
      expect(
        only.findByPath("https://elsewhere.example.test/admin", "https://app.example.test")
      ).toBeUndefined();
    });

    it("returns undefined when nothing matches", () => {
      const only = new PanelRegistry().register(panel({ id: "app", path: "/app" }));
      expect(only.findByPath("/admin")).toBeUndefined();
    });
  });

  describe("bottom navigation enablement", () => {
    beforeEach(() => {
      panels.register(panel({ id: "admin" }));
    });

    it("is enabled by default", () => {
      expect(panels.isBottomNavigationEnabled("admin")).toBe(true);
    });

    it("respects the definition's own setting", () => {
      panels.register(panel({ id: "app", bottomNavigation: false }));
      expect(panels.isBottomNavigationEnabled("app")).toBe(false);
    });

    it("can be disabled and re-enabled", () => {
      panels.setBottomNavigation("admin", false);
      expect(panels.isBottomNavigationEnabled("admin")).toBe(false);

      panels.setBottomNavigation("admin");
      expect(panels.isBottomNavigationEnabled("admin")).toBe(true);
    });

    it("evaluates a condition on every call", () => {
      let mobile = false;
      const condition = vi.fn(() => mobile);
      panels.setBottomNavigation("admin", condition);

      expect(panels.isBottomNavigationEnabled("admin")).toBe(false);
      mobile = true;
      expect(panels.isBottomNavigationEnabled("admin")).toBe(true);
      expect(condition).toHaveBeenCalledTimes(2);
    });

    it("throws for an unknown panel", () => {
      expect(() => panels.isBottomNavigationEnabled("missing")).toThrow(
        'Panel "missing" is not registered.'
      );
    });
  });

  describe("getBottomNavigationStatus()", () => {
    it("reports active and disabled panels", () => {
      panels
        .register(panel({ id: "admin" }))
        .register(panel({ id: "app", bottomNavigation: false }));

      expect(panels.getBottomNavigationStatus("admin")).toBe(
        "Mobile Bottom Navigation [admin]: ACTIVE"
      );
      expect(panels.getBottomNavigationStatus("app")).toBe(
        "Mobile Bottom Navigation [app]: DISABLED"
      );
    });
  });

  describe("getNavigation()", () => {
    it("flattens a static list with groups", () => {
      panels.register(
        panel({
          id: "admin",
          navigation: [
            { label: "Dashboard", url: "/admin" },
            { label: "Shop", items: [{ label: "Orders", url: "/admin/orders" }] },
          ],
        })
      );

      expect(panels.getNavigation("admin")).toEqual([
        { label: "Dashboard", url: "/admin" },
        { label: "Orders", url: "/admin/orders" },
      ]);
    });

    it("calls a navigation function once per request", () => {
      let unread = 1;
      const source = vi.fn(() => [{ label: "Inbox", url: "/admin/inbox", badge: unread }]);
      panels.register(panel({ id: "admin", navigation: source }));

      expect(panels.getNavigation("admin")[0].badge).toBe(1);
      unread = 4;
      expect(panels.getNavigation("admin")[0].badge).toBe(4);
      expect(source).toHaveBeenCalledTimes(2);
    });
  });
});
