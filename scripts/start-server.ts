/**
 * Start the browser stream server.
 *
 * Environment variables:
 *   PORT                    - HTTP API port (default: 5000)
 *   HOST                    - Interface to bind (default: 0.0.0.0)
 *   HEADLESS                - "false" shows the browser window (default: true)
 *   BROWSER                 - chromium, firefox or webkit (default: chromium)
 *   SESSION_IDLE_TIMEOUT_MS - Close sessions idle this long; 0 disables (default: 0)
 *   BROWSER_STREAM_CONFIG   - Config file path (default: ~/.browser-stream/config.json)
 *
 * Browsers are not installed by this script; run `npx playwright install`
 * for the engines you use.
 *
 * Usage:
 *   npx tsx scripts/start-server.ts
 *   # Output: HTTP API: http://0.0.0.0:5000
 */

import { configFilePath, serve } from "../src/index.js";

console.log("Starting browser stream server...");
console.log(`  Config: ${configFilePath()}`);
console.log("");

const server = await serve();

console.log("");
console.log("Browser stream server started");
console.log(`  HTTP API: http://${server.host}:${server.port}`);
console.log(`  MJPEG stream: http://${server.host}:${server.port}/api/stream/mjpeg`);
console.log("");
console.log("Ready");
console.log("");
console.log("Press Ctrl+C to stop");

// Keep the process running
await new Promise(() => {});
