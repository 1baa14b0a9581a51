/**
 * Render Hooks
 *
 * Named points in the host's page layout where integrations inject
 * HTML. The host calls render("body.end", ctx) while building a page
 * and places the result just before </body>.
 *
 * Errors from a hook propagate to the host: a page with half a
 * navigation bar is worse than an error page.
 */

import type { RenderContext } from "@navdock/contracts";

export const RENDER_HOOKS = ["body.start", "body.end"] as const;

export type RenderHookName = (typeof RENDER_HOOKS)[number];

export type RenderHook = (context: RenderContext) => string;

export class RenderHookRegistry {
  private readonly hooks = new Map<RenderHookName, RenderHook[]>();

  /** Adds a hook. Hooks at the same point render in registration order. */
  register(name: RenderHookName, hook: RenderHook): this {
    const list = this.hooks.get(name) ?? [];
    list.push(hook);
    this.hooks.set(name, list);
    return this;
  }

  /** Renders every hook registered at a point and joins the output. */
  render(name: RenderHookName, context: RenderContext): string {
    return (this.hooks.get(name) ?? []).map((hook) => hook(context)).join("");
  }
}
