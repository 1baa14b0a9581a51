/**
 * Observability Module
 *
 * Captures errors and operational messages from the host integration.
 * Follows the provider pattern: pluggable backends with a console default.
 *
 * Providers:
 *   - ConsoleObservabilityProvider (structured console output, default)
 *   - NullObservabilityProvider (NAVDOCK_OBSERVABILITY=off)
 *
 * Usage:
 *   initObservability();  // Call once at startup
 *
 *   captureException(error, { panelId: "admin" });
 *   captureMessage("Navigation hook disabled", "warning", { panelId: "app" });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to every event for filtering */
export interface ObservabilityContext {
  panelId?: string;
  path?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  /** Provider name (for logging) */
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        message: error.message,
        stack: error.stack,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    const logFn =
      level === "fatal" || level === "error"
        ? console.error
        : level === "warning"
          ? console.warn
          : level === "debug"
            ? console.debug
            : console.log;

    logFn(
      JSON.stringify({
        level,
        context: "observability",
        event: "message",
        message,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  async flush(): Promise<void> {
    // Console writes are synchronous
  }
}

// ---------------------------------------------------------------------------
// Null Provider
// ---------------------------------------------------------------------------

export class NullObservabilityProvider implements ObservabilityProvider {
  readonly name = "null";

  captureException(): void {
    // Discarded
  }

  captureMessage(): void {
    // Discarded
  }

  async flush(): Promise<void> {
    // Nothing buffered
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

// ---------------------------------------------------------------------------
// Initialization
// ---------------------------------------------------------------------------

/**
 * Initialize the observability module.
 * Picks the provider from NAVDOCK_OBSERVABILITY:
 *   - "off" → Null provider
 *   - anything else → Console provider
 *
 * Safe to call multiple times. Never throws.
 */
export function initObservability(env: NodeJS.ProcessEnv = process.env): void {
  if (env.NAVDOCK_OBSERVABILITY === "off") {
    provider = new NullObservabilityProvider();
  } else {
    provider = new ConsoleObservabilityProvider();
  }
}

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

export function captureException(
  error: Error,
  context?: ObservabilityContext
): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

/** Get the current observability provider (for testing/inspection) */
export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Override the observability provider (for testing) */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

// ---------------------------------------------------------------------------
// Testing Helpers
// ---------------------------------------------------------------------------

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
