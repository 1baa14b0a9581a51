/**
 * Client Entry Tests
 *
 * The enhancement runs immediately on a parsed document and waits for
 * DOMContentLoaded on one that is still loading.
 */

import { describe, it, expect, afterEach } from "vitest";
import { ready, whenReady } from "./client.js";

function navMarkup(): string {
  return '<nav class="ndk-bottom-nav"><ul><li><a class="ndk-nav-item" href="/">Home</a></li></ul></nav>';
}

describe("client entry", () => {
  afterEach(() => {
    document.body.innerHTML = "";
  });

  it("enhances the current document on import", async () => {
    const enhancement = await ready;
    expect(typeof enhancement.disconnect).toBe("function");
  });

  it("enhances a parsed document right away", async () => {
    const doc = document.implementation.createHTMLDocument("parsed");
    Object.defineProperty(doc, "readyState", { value: "complete", configurable: true });
    doc.body.innerHTML = navMarkup();

    const enhancement = await whenReady(doc);
    expect(enhancement.size).toBe(1);
    enhancement.disconnect();
  });

  it("waits for DOMContentLoaded while the document is loading", async () => {
    const doc = document.implementation.createHTMLDocument("loading");
    Object.defineProperty(doc, "readyState", { value: "loading", configurable: true });

    let settled = false;
    const pending = whenReady(doc).then((enhancement) => {
      settled = true;
      return enhancement;
    });

    doc.body.innerHTML = navMarkup();
    await Promise.resolve();
    expect(settled).toBe(false);

    doc.dispatchEvent(new Event("DOMContentLoaded"));
    const enhancement = await pending;
    expect(settled).toBe(true);
    expect(enhancement.size).toBe(1);
    enhancement.disconnect();
  });
});
