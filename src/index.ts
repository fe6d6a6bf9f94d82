import cors, { type CorsOptions } from "cors";
import express, { type Express } from "express";
import type { Server } from "http";
import type { Socket } from "net";
import { loadConfig, type BrowserStreamConfig } from "./config.js";
import { registerApiRoutes } from "./http-routes.js";
import { BrowserService, type BrowserServiceOptions } from "./service.js";
import type { ServeOptions } from "./types.js";

export type {
  ServeOptions,
  OperationResult,
  NavigateResult,
  ScreenshotResult,
  EvaluateResult,
  ActionResult,
  ElementTextResult,
  PageContentResult,
  ClickAtResult,
  StatusResponse,
  StreamStatus,
} from "./types.js";
export type { BrowserStreamConfig } from "./config.js";
export type { BrowserKind, EngineLauncher, LauncherFactory, Viewport } from "./engine-types.js";
export { configFilePath, loadConfig, DEFAULT_CONFIG } from "./config.js";
export { BrowserService } from "./service.js";
export { createApiHandlers, registerApiRoutes } from "./http-routes.js";
export { mapStreamClick } from "./coordinates.js";
export { connectLite, type BrowserStreamClient } from "./client-lite.js";

export interface BrowserStreamServer {
  port: number;
  host: string;
  service: BrowserService;
  stop: () => Promise<void>;
}

export const CORS_OPTIONS: CorsOptions = {
  origin: "*",
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type"],
};

/** Build the Express app for a service without listening. */
export function createApp(service: BrowserService): Express {
  const app: Express = express();
  // Before the body parser, so malformed JSON errors carry CORS headers too
  app.use(cors(CORS_OPTIONS));
  app.use(express.json({ limit: "10mb" }));
  registerApiRoutes(app, service);
  return app;
}

export function resolveConfig(options: ServeOptions = {}): BrowserStreamConfig {
  const config = { ...loadConfig(), ...options.config };
  return {
    ...config,
    port: options.port ?? config.port,
    host: options.host ?? config.host,
    headless: options.headless ?? config.headless,
    browserType: options.browserType ?? config.browserType,
  };
}

export async function serve(
  options: ServeOptions = {},
  serviceOptions: Omit<BrowserServiceOptions, "config" | "launcher"> = {}
): Promise<BrowserStreamServer> {
  const config = resolveConfig(options);

  // Validate port numbers
  if (config.port < 1 || config.port > 65535) {
    throw new Error(`Invalid port: ${config.port}. Must be between 1 and 65535`);
  }

  const service = new BrowserService({ ...serviceOptions, config, launcher: options.launcher });

  console.log(`Launching ${config.browserType} (headless: ${config.headless})...`);
  await service.start();

  const app = createApp(service);

  let server: Server;
  try {
    server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(config.port, config.host, () => resolve(listening));
      listening.once("error", reject);
    });
  } catch (err) {
    await service.stop();
    throw err;
  }
  console.log(`HTTP API server running on http://${config.host}:${config.port}`);

  // Track active connections for clean shutdown; MJPEG viewers never end on their own
  const connections = new Set<Socket>();
  server.on("connection", (socket: Socket) => {
    connections.add(socket);
    socket.on("close", () => connections.delete(socket));
  });

  // Track if cleanup has been called to avoid double cleanup
  let cleaningUp: Promise<void> | null = null;

  const cleanup = (): Promise<void> => {
    if (cleaningUp) return cleaningUp;

    cleaningUp = (async () => {
      console.log("\nShutting down...");

      for (const socket of connections) {
        socket.destroy();
      }
      connections.clear();

      try {
        await service.stop();
      } catch (err) {
        console.error("Error stopping browser:", err);
      }

      await new Promise<void>((resolve) => server.close(() => resolve()));
      console.log("Server stopped.");
    })();
    return cleaningUp;
  };

  const signals = ["SIGINT", "SIGTERM", "SIGHUP"] as const;

  const signalHandler = async () => {
    await cleanup();
    process.exit(0);
  };

  const errorHandler = async (err: unknown) => {
    console.error("Unhandled error:", err);
    await cleanup();
    process.exit(1);
  };

  signals.forEach((sig) => process.on(sig, signalHandler));
  process.on("uncaughtException", errorHandler);
  process.on("unhandledRejection", errorHandler);

  const removeHandlers = () => {
    signals.forEach((sig) => process.off(sig, signalHandler));
    process.off("uncaughtException", errorHandler);
    process.off("unhandledRejection", errorHandler);
  };

  return {
    port: config.port,
    host: config.host,
    service,
    async stop() {
      removeHandlers();
      await cleanup();
    },
  };
}
