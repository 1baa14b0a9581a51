/**
 * @navdock/ui
 *
 * Bottom navigation components and the keyboard enhancement.
 * Server rendering lives in "@navdock/ui/server", the browser
 * auto-init in "@navdock/ui/client".
 */

// Utilities
export { cn, formatBadge } from "./utils.js";

// Components
export {
  BottomNavigation,
  DEFAULT_NAV_LABEL,
  type BottomNavigationProps,
} from "./BottomNavigation.js";
export { NavigationBadge } from "./NavigationBadge.js";
export { NavigationIcon, iconPath } from "./NavigationIcon.js";

// Keyboard
export {
  BottomNavigationKeyboard,
  initBottomNavigationKeyboard,
  NAV_SELECTOR,
  ITEM_SELECTOR,
  type KeyboardEnhancement,
} from "./keyboard.js";
