/**
 * `linkmux` / `linkmux connect <peer>`: interactive monitor.
 */
import { render } from "ink";
import React from "react";
import { App } from "../app.js";
import type { Link } from "../sdk/link.js";

export async function runMonitor(link: Link, opts: { connectTo?: string } = {}): Promise<void> {
  // Clear the screen so the monitor starts with a fresh viewport.
  process.stdout.write("\x1b[2J\x1b[H");

  const instance = render(
    React.createElement(App, {
      manager: link.manager,
      serviceName: link.config.serviceName,
      connectTo: opts.connectTo,
    }),
  );

  try {
    await instance.waitUntilExit();
  } finally {
    link.close();
  }
}
