/**
 * @navdock/contracts
 *
 * Public API: the shared boundary between platform and UI.
 * Both sides import from this package. Neither imports from the other.
 */

// Navigation
export type {
  BadgeValue,
  NavigationItemDescriptor,
  NavigationItemInput,
  ResolvedNavigationItem,
  NavigationGroup,
  NavigationEntry,
  BottomNavigationRenderOptions,
  BottomNavigationRenderer,
} from "./navigation.js";
export {
  textBadge,
  countBadge,
  badgeValueSchema,
  badgeInputSchema,
  navigationItemDescriptorSchema,
  isNavigationGroup,
} from "./navigation.js";

// Panels
export type {
  PanelDefinition,
  NavigationSource,
  BottomNavigationCondition,
} from "./panel.js";

// Context (provided by platform to integrations)
export type { Logger, RenderContext } from "./context.js";
