/**
 * Platform Context
 *
 * Services the platform hands to host integrations.
 * Hosts never construct these themselves; they receive them.
 */

/**
 * Structured logger.
 * Integrations should use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Per-request information passed to render hooks.
 */
export interface RenderContext {
  /** Request path or URL, query string included */
  path: string;
}
