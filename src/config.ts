/**
 * Configuration for the browser stream server.
 *
 * Values are merged from, in increasing precedence:
 * - built-in defaults
 * - ~/.browser-stream/config.json (or the file named by BROWSER_STREAM_CONFIG)
 * - environment variables (PORT, HOST, HEADLESS, BROWSER, SESSION_IDLE_TIMEOUT_MS)
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { BrowserKind, Viewport } from "./engine-types.js";
import { browserKindSchema } from "./schemas.js";

export interface StreamDefaults {
  /** Frames per second, clamped to 1-60 (default: 30) */
  fps: number;
  /** JPEG quality, clamped to 10-100 (default: 80) */
  quality: number;
}

export interface BrowserStreamConfig {
  /** HTTP API port (default: 5000) */
  port: number;
  /** Interface to bind (default: 0.0.0.0) */
  host: string;
  headless: boolean;
  browserType: BrowserKind;
  /** Viewport for contexts created without one (default: 1280x720) */
  viewport: Viewport;
  stream: StreamDefaults;
  /** Close sessions idle for longer than this; 0 disables the reaper */
  sessionIdleTimeoutMs: number;
}

export const DEFAULT_CONFIG: BrowserStreamConfig = {
  port: 5000,
  host: "0.0.0.0",
  headless: true,
  browserType: "chromium",
  viewport: { width: 1280, height: 720 },
  stream: { fps: 30, quality: 80 },
  sessionIdleTimeoutMs: 0,
};

const fileConfigSchema = z
  .object({
    port: z.number().int().min(1).max(65535),
    host: z.string().min(1),
    headless: z.boolean(),
    browserType: browserKindSchema,
    viewport: z.object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    }),
    stream: z
      .object({
        fps: z.number(),
        quality: z.number(),
      })
      .partial(),
    sessionIdleTimeoutMs: z.number().int().nonnegative(),
  })
  .partial();

type FileConfig = z.infer<typeof fileConfigSchema>;

export function configFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return env.BROWSER_STREAM_CONFIG || join(env.HOME || "", ".browser-stream", "config.json");
}

function readConfigFile(path: string): FileConfig {
  try {
    if (existsSync(path)) {
      return fileConfigSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
    }
  } catch (err) {
    console.warn(`Warning: Could not load config from ${path}:`, err);
  }
  return {};
}

function parsePort(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const port = parseInt(value, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${value}. Must be between 1 and 65535`);
  }
  return port;
}

function parseBrowserKind(value: string | undefined): BrowserKind | undefined {
  if (!value) return undefined;
  const parsed = browserKindSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid browser type: ${value}. Must be chromium, firefox or webkit`);
  }
  return parsed.data;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const timeout = parseInt(value, 10);
  if (Number.isNaN(timeout) || timeout < 0) {
    throw new Error(`Invalid SESSION_IDLE_TIMEOUT_MS: ${value}`);
  }
  return timeout;
}

/**
 * Load configuration with defaults. An unreadable or invalid config file is
 * reported and ignored; invalid environment values throw.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BrowserStreamConfig {
  const file = readConfigFile(configFilePath(env));

  return {
    port: parsePort(env.PORT) ?? file.port ?? DEFAULT_CONFIG.port,
    host: env.HOST || file.host || DEFAULT_CONFIG.host,
    headless: env.HEADLESS !== undefined ? env.HEADLESS !== "false" : (file.headless ?? DEFAULT_CONFIG.headless),
    browserType: parseBrowserKind(env.BROWSER) ?? file.browserType ?? DEFAULT_CONFIG.browserType,
    viewport: { ...DEFAULT_CONFIG.viewport, ...(file.viewport || {}) },
    stream: { ...DEFAULT_CONFIG.stream, ...(file.stream || {}) },
    sessionIdleTimeoutMs:
      parseTimeout(env.SESSION_IDLE_TIMEOUT_MS) ?? file.sessionIdleTimeoutMs ?? DEFAULT_CONFIG.sessionIdleTimeoutMs,
  };
}
