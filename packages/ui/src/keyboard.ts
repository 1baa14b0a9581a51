/**
 * Bottom Navigation Keyboard Enhancement
 *
 * Adds roving keyboard movement between the links of a bottom navigation:
 *   - ArrowRight / ArrowLeft move to the next / previous item, wrapping
 *     (directions swap inside dir="rtl")
 *   - Home / End jump to the first / last item
 *
 * Tab, Enter, and Space keep their native behavior, and nothing happens
 * unless focus is on one of the items.
 */

export const NAV_SELECTOR = ".ndk-bottom-nav";
export const ITEM_SELECTOR = ".ndk-nav-item";

const NAVIGATION_KEYS = ["ArrowLeft", "ArrowRight", "Home", "End"] as const;

type NavigationKey = (typeof NAVIGATION_KEYS)[number];

function isNavigationKey(key: string): key is NavigationKey {
  return NAVIGATION_KEYS.some((candidate) => candidate === key);
}

export class BottomNavigationKeyboard {
  readonly nav: HTMLElement;

  private readonly onKeydown = (event: KeyboardEvent) => this.handleKeydown(event);

  constructor(nav: HTMLElement) {
    this.nav = nav;
    this.nav.addEventListener("keydown", this.onKeydown);
  }

  /** Current items, queried live so re-rendered lists keep working */
  items(): HTMLElement[] {
    return Array.from(this.nav.querySelectorAll<HTMLElement>(ITEM_SELECTOR));
  }

  handleKeydown(event: KeyboardEvent): void {
    const { key } = event;
    if (!isNavigationKey(key)) return;
    // Alt+Arrow is browser history; leave modified keys alone
    if (event.altKey || event.ctrlKey || event.metaKey) return;

    const items = this.items();
    const current = items.findIndex((item) => item === event.target);
    if (current === -1) return;

    event.preventDefault();
    const next = this.targetIndex(key, current, items.length);
    if (next !== current) {
      items[next].focus();
    }
  }

  isRtl(): boolean {
    return this.nav.closest("[dir]")?.getAttribute("dir")?.toLowerCase() === "rtl";
  }

  destroy(): void {
    this.nav.removeEventListener("keydown", this.onKeydown);
  }

  private targetIndex(key: NavigationKey, current: number, count: number): number {
    if (key === "Home") return 0;
    if (key === "End") return count - 1;

    const step = (key === "ArrowRight") !== this.isRtl() ? 1 : -1;
    return (current + step + count) % count;
  }
}

export interface KeyboardEnhancement {
  /** Number of navigation elements currently enhanced */
  readonly size: number;
  /** Stops watching for new navigation and removes all listeners */
  disconnect(): void;
}

/**
 * Enhances every bottom navigation under root, now and as they are
 * added later (e.g., after a client-side page swap). Navs removed from
 * root lose their listeners.
 */
export function initBottomNavigationKeyboard(
  root: Document | HTMLElement = document
): KeyboardEnhancement {
  const enhanced = new Map<HTMLElement, BottomNavigationKeyboard>();

  const navsIn = (node: HTMLElement): HTMLElement[] => [
    ...(node.matches(NAV_SELECTOR) ? [node] : []),
    ...Array.from(node.querySelectorAll<HTMLElement>(NAV_SELECTOR)),
  ];

  const enhance = (nav: HTMLElement) => {
    if (!enhanced.has(nav) && root.contains(nav)) {
      enhanced.set(nav, new BottomNavigationKeyboard(nav));
    }
  };

  // Navs that left the document (e.g., replaced by a page swap)
  const release = (nav: HTMLElement) => {
    const keyboard = enhanced.get(nav);
    if (keyboard && !root.contains(nav)) {
      keyboard.destroy();
      enhanced.delete(nav);
    }
  };

  root.querySelectorAll<HTMLElement>(NAV_SELECTOR).forEach(enhance);

  const observer =
    typeof MutationObserver === "undefined"
      ? undefined
      : new MutationObserver((mutations) => {
          for (const mutation of mutations) {
            for (const node of mutation.removedNodes) {
              if (node instanceof HTMLElement) navsIn(node).forEach(release);
            }
            for (const node of mutation.addedNodes) {
              if (node instanceof HTMLElement) navsIn(node).forEach(enhance);
            }
          }
        });
  observer?.observe(root, { childList: true, subtree: true });

  return {
    get size() {
      return enhanced.size;
    },
    disconnect() {
      observer?.disconnect();
      for (const keyboard of enhanced.values()) {
        keyboard.destroy();
      }
      enhanced.clear();
    },
  };
}
