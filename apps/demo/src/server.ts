/**
 * Demo HTTP Server
 *
 * Serves every page of a registered panel with the render hooks
 * injected, plus the bottom navigation stylesheet.
 *
 *   GET /health                          → { status: "ok" }
 *   GET /assets/bottom-navigation.css    → stylesheet
 *   GET /*                               → panel page (404 outside panels)
 */

import { readFile } from "node:fs/promises";
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import helmet from "@fastify/helmet";
import { captureException, InvalidDescriptorError } from "@navdock/platform";
import { bottomNavigationStylesheetPath } from "@navdock/ui/server";
import type { AppContext } from "./bootstrap.js";

export const STYLESHEET_URL = "/assets/bottom-navigation.css";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

interface PageOptions {
  title: string;
  content: string;
  bodyStart?: string;
  bodyEnd?: string;
}

/** Minimal page layout. Hook output sits directly inside <body>. */
export function renderPage({ title, content, bodyStart = "", bodyEnd = "" }: PageOptions): string {
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1, viewport-fit=cover">
    <title>${escapeHtml(title)}</title>
    <link rel="stylesheet" href="${STYLESHEET_URL}">
  </head>
  <body>${bodyStart}
    <main>${content}</main>
    ${bodyEnd}
  </body>
</html>
`;
}

export async function buildServer({ config, panels, hooks, logger }: AppContext): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own structured logging
  });

  // Security headers; CSP in production only
  await app.register(helmet, {
    contentSecurityPolicy: process.env.NODE_ENV === "production",
  });

  app.setErrorHandler((error, request, reply) => {
    const code = error instanceof InvalidDescriptorError ? error.code : "INTERNAL_ERROR";
    logger.error(error.message, { code, path: request.url });
    captureException(error, { path: request.url, code });
    return reply.status(500).send({ error: error.message, code });
  });

  app.get("/health", async () => ({ status: "ok" }));

  app.get(STYLESHEET_URL, async (_request, reply) => {
    const css = await readFile(bottomNavigationStylesheetPath, "utf8");
    return reply.type("text/css; charset=utf-8").send(css);
  });

  const pageHandler = async (request: FastifyRequest, reply: FastifyReply) => {
    const path = request.url;
    const panel = panels.findByPath(path, config.navigation.origin);
    reply.type("text/html; charset=utf-8");

    if (!panel) {
      return reply.status(404).send(
        renderPage({
          title: "Not found",
          content: `<h1>Not found</h1><p>No panel serves <code>${escapeHtml(path)}</code>.</p>`,
        })
      );
    }

    const context = { path };
    return reply.send(
      renderPage({
        title: panel.label ?? panel.id,
        content: `<h1>${escapeHtml(panel.label ?? panel.id)}</h1><p>You are at <code>${escapeHtml(path)}</code>.</p>`,
        bodyStart: hooks.render("body.start", context),
        bodyEnd: hooks.render("body.end", context),
      })
    );
  };

  app.get("/", pageHandler);
  app.get("/*", pageHandler);

  return app;
}
