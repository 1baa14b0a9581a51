/**
 * Browser entry — @navdock/ui/client
 *
 * Include once per page (bundled by the host). Enhances the bottom
 * navigation on DOM ready and any navigation added afterwards.
 */

import { initBottomNavigationKeyboard, type KeyboardEnhancement } from "./keyboard.js";

export { BottomNavigationKeyboard, initBottomNavigationKeyboard } from "./keyboard.js";
export type { KeyboardEnhancement } from "./keyboard.js";

/**
 * Runs the enhancement once the document is parsed.
 * Resolves with the handle so callers can disconnect it.
 */
export function whenReady(doc: Document = document): Promise<KeyboardEnhancement> {
  if (doc.readyState === "loading") {
    return new Promise((resolve) => {
      doc.addEventListener(
        "DOMContentLoaded",
        () => resolve(initBottomNavigationKeyboard(doc)),
        { once: true }
      );
    });
  }
  return Promise.resolve(initBottomNavigationKeyboard(doc));
}

export const ready = whenReady();
