/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup; fail fast if misconfigured.
 */

export interface NavdockConfig {
  navigation: {
    /** Accessible name of the bottom navigation landmark */
    ariaLabel: string;
    /** Badge counts above this render as "{max}+" */
    maxBadgeCount: number;
    /** The host's own origin, for matching absolute item URLs */
    origin?: string;
  };
  server: {
    port: number;
    host: string;
  };
}

export const DEFAULT_ARIA_LABEL = "Mobile bottom navigation";
export const DEFAULT_MAX_BADGE_COUNT = 99;

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(
      `${name} must be a positive integer, got "${raw}". See .env.example.`
    );
  }
  return value;
}

function parseOrigin(raw: string | undefined): string | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(
      `NAVDOCK_ORIGIN must be an absolute URL (e.g. https://app.example.test), got "${raw}".`
    );
  }
  return url.origin;
}

/**
 * Loads configuration from process.env (or the given env).
 * Throws immediately if a variable is set to an invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): NavdockConfig {
  const ariaLabel = env.NAVDOCK_ARIA_LABEL?.trim();

  return {
    navigation: {
      ariaLabel: ariaLabel ? ariaLabel : DEFAULT_ARIA_LABEL,
      maxBadgeCount: parsePositiveInt(
        "NAVDOCK_MAX_BADGE_COUNT",
        env.NAVDOCK_MAX_BADGE_COUNT,
        DEFAULT_MAX_BADGE_COUNT
      ),
      origin: parseOrigin(env.NAVDOCK_ORIGIN),
    },
    server: {
      port: parsePositiveInt("PORT", env.PORT, 4000),
      host: env.HOST ?? "0.0.0.0",
    },
  };
}
