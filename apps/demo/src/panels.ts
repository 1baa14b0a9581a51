/**
 * Demo Panels
 *
 * Two panels in the shape a host application would declare them:
 *   - "admin": staff area with the bottom navigation enabled
 *   - "app": customer area with it switched off
 *
 * The admin navigation is a function so the inbox badge reflects the
 * unread count at render time.
 */

import type { PanelDefinition } from "@navdock/contracts";
import { PanelRegistry } from "@navdock/platform";

export interface DemoState {
  unread: number;
}

export function adminPanel(state: DemoState): PanelDefinition {
  return {
    id: "admin",
    path: "/admin",
    label: "Admin",
    navigation: () => [
      {
        label: "Overview",
        items: [
          { label: "Dashboard", url: "/admin", icon: "heroicon-o-home", sortOrder: 1 },
          { label: "Users", url: "/admin/users", icon: "heroicon-o-users", sortOrder: 2 },
        ],
      },
      {
        label: "Inbox",
        url: "/admin/inbox",
        icon: "heroicon-o-inbox",
        badge: state.unread > 0 ? state.unread : null,
        accessibleLabel: state.unread > 0 ? `Inbox, ${state.unread} unread` : null,
        sortOrder: 3,
      },
      { label: "Settings", url: "/admin/settings", icon: "heroicon-o-cog-6-tooth", sortOrder: 4 },
      { label: "Help", url: "https://help.example.com", icon: "book", openInNewTab: true },
    ],
  };
}

export function appPanel(): PanelDefinition {
  return {
    id: "app",
    path: "/app",
    label: "Customer App",
    navigation: [
      { label: "Home", url: "/app", icon: "home" },
      { label: "Orders", url: "/app/orders", icon: "cart", badge: "new" },
    ],
    bottomNavigation: false,
  };
}

export function createDemoPanels(state: DemoState = { unread: 3 }): PanelRegistry {
  return new PanelRegistry().register(adminPanel(state)).register(appPanel());
}
