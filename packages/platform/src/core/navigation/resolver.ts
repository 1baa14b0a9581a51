/**
 * Navigation Resolver
 *
 * Turns a host's navigation descriptors and the current request path
 * into the ordered, render-ready list the bottom bar displays.
 *
 * Sequence:
 *   1. Validate every descriptor (InvalidDescriptorError on failure)
 *   2. Stable sort by sortOrder; unsorted items go last
 *   3. Mark the first exact path match as active
 *
 * Pure and synchronous: no I/O, no logging, input never mutated.
 */

import {
  isNavigationGroup,
  type NavigationEntry,
  type NavigationItemDescriptor,
  type NavigationItemInput,
  type ResolvedNavigationItem,
} from "@navdock/contracts";
import { normalizePath } from "./paths.js";
import { validateDescriptors } from "./validation.js";

export interface ResolveOptions {
  /**
   * The host's own origin. Absolute item URLs on this origin match
   * the equivalent path.
   */
  origin?: string;
}

function compareSortOrder(a: number | undefined, b: number | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a - b;
}

/**
 * Orders items by sortOrder ascending.
 * Ties keep their original relative order, so the bar never reshuffles
 * between requests.
 */
export function sortDescriptors<T extends { sortOrder?: number }>(
  items: readonly T[]
): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort(
      (a, b) =>
        compareSortOrder(a.item.sortOrder, b.item.sortOrder) || a.index - b.index
    )
    .map(({ item }) => item);
}

/**
 * Resolves navigation for one request.
 *
 * @example
 * resolve(
 *   [
 *     { label: "Dashboard", url: "/admin", sortOrder: 1 },
 *     { label: "Users", url: "/admin/users", sortOrder: 2 },
 *   ],
 *   "/admin/users/"
 * );
 * // → Dashboard (isActive: false), Users (isActive: true)
 */
export function resolve(
  items: readonly NavigationItemInput[],
  currentPath: string,
  options: ResolveOptions = {}
): ResolvedNavigationItem[] {
  const descriptors: NavigationItemDescriptor[] = validateDescriptors(items);
  const current = normalizePath(currentPath, options.origin);

  let activeFound = false;
  return sortDescriptors(descriptors).map((descriptor) => {
    const isActive =
      !activeFound && normalizePath(descriptor.url, options.origin) === current;
    if (isActive) activeFound = true;
    return { ...descriptor, isActive };
  });
}

/**
 * Flattens grouped navigation into a single list, in order.
 */
export function flattenNavigation(
  entries: readonly NavigationEntry[]
): NavigationItemInput[] {
  return entries.flatMap((entry) =>
    isNavigationGroup(entry) ? entry.items : [entry]
  );
}
