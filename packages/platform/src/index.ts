/**
 * @navdock/platform
 *
 * The navigation engine. Provides the resolver, panel registry,
 * render hooks, and the ambient services (config, logging, observability).
 */

// Config
export {
  loadConfig,
  DEFAULT_ARIA_LABEL,
  DEFAULT_MAX_BADGE_COUNT,
  type NavdockConfig,
} from "./core/config/index.js";

// Navigation
export {
  resolve,
  sortDescriptors,
  flattenNavigation,
  type ResolveOptions,
} from "./core/navigation/resolver.js";
export { normalizePath } from "./core/navigation/paths.js";
export {
  validateDescriptor,
  validateDescriptors,
  InvalidDescriptorError,
  type DescriptorFieldError,
} from "./core/navigation/validation.js";

// Panels
export { PanelRegistry } from "./core/panels/index.js";

// Render Hooks
export {
  RenderHookRegistry,
  RENDER_HOOKS,
  type RenderHook,
  type RenderHookName,
} from "./core/render-hooks/index.js";
export {
  createBottomNavigationHook,
  type BottomNavigationHookOptions,
} from "./core/render-hooks/bottom-navigation-hook.js";

// Logging
export {
  createLogger,
  logLevelFrom,
  LOG_LEVELS,
  type LogLevel,
} from "./core/logging/index.js";

// Observability
export {
  initObservability,
  captureException,
  captureMessage,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  NullObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";
