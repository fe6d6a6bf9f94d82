/**
 * Request body schemas, one per endpoint. Each schema lists every option the
 * endpoint recognizes together with its default; parsed values are what the
 * dispatcher and the stream controls receive.
 */

import { z } from "zod";
import { clampQuality } from "./stream-settings.js";

const sessionId = z.string({ required_error: "sessionId is required" }).min(1, "sessionId is required");
const selector = z.string({ required_error: "selector is required" }).min(1, "selector is required");
const timeout = (fallback: number) => z.number().int().positive().default(fallback);

export const waitUntilSchema = z.enum(["load", "domcontentloaded", "networkidle"]);
export const mouseButtonSchema = z.enum(["left", "right", "middle"]);
export const browserKindSchema = z.enum(["chromium", "firefox", "webkit"]);

export const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const browserStartSchema = z.object({
  browserType: browserKindSchema.optional(),
  headless: z.boolean().optional(),
});

export const createSessionSchema = z.object({
  viewport: viewportSchema.optional(),
  userAgent: z.string().min(1).optional(),
  optimize: z.boolean().default(false),
  blockResources: z.array(z.string()).default([]),
});

export const closeSessionSchema = z.object({ sessionId });

export const navigateSchema = z.object({
  sessionId,
  url: z.string({ required_error: "url is required" }).min(1, "url is required"),
  waitUntil: waitUntilSchema.default("load"),
  timeout: timeout(30000),
});

export const screenshotSchema = z.object({
  sessionId,
  fullPage: z.boolean().default(true),
  quality: z.number().default(80).transform((quality) => clampQuality(quality)),
});

export const contentSchema = z.object({
  sessionId,
  includeHtml: z.boolean().default(false),
});

export const executeSchema = z.object({
  sessionId,
  script: z.string({ required_error: "script is required" }).min(1, "script is required"),
  timeout: timeout(30000),
});

export const clickSchema = z.object({
  sessionId,
  selector,
  timeout: timeout(5000),
  button: mouseButtonSchema.default("left"),
});

export const typeSchema = z.object({
  sessionId,
  selector,
  text: z.string({ required_error: "text is required" }),
  delay: z.number().int().nonnegative().default(0),
  timeout: timeout(5000),
});

export const elementSchema = z.object({
  sessionId,
  selector,
  timeout: timeout(5000),
});

// fps and quality are clamped by the capture loop rather than rejected here.
export const streamStartSchema = z.object({
  fps: z.number().optional(),
  quality: z.number().optional(),
  sessionId: sessionId.optional(),
});

export const streamSettingsSchema = z.object({
  fps: z.number().optional(),
  quality: z.number().optional(),
});

export const streamClickSchema = z.object({
  x: z.number({ required_error: "x is required" }),
  y: z.number({ required_error: "y is required" }),
  containerWidth: z.number().optional(),
  containerHeight: z.number().optional(),
  button: mouseButtonSchema.default("left"),
});

export type BrowserStartRequest = z.input<typeof browserStartSchema>;
export type CreateSessionRequest = z.input<typeof createSessionSchema>;
export type CloseSessionRequest = z.input<typeof closeSessionSchema>;
export type NavigateRequest = z.input<typeof navigateSchema>;
export type ScreenshotRequest = z.input<typeof screenshotSchema>;
export type ContentRequest = z.input<typeof contentSchema>;
export type ExecuteRequest = z.input<typeof executeSchema>;
export type ClickRequest = z.input<typeof clickSchema>;
export type TypeRequest = z.input<typeof typeSchema>;
export type ElementRequest = z.input<typeof elementSchema>;
export type StreamStartRequest = z.input<typeof streamStartSchema>;
export type StreamSettingsRequest = z.input<typeof streamSettingsSchema>;
export type StreamClickRequest = z.input<typeof streamClickSchema>;

export type NavigateOptions = Omit<z.output<typeof navigateSchema>, "sessionId">;
export type ScreenshotOptions = Omit<z.output<typeof screenshotSchema>, "sessionId">;
export type ContentOptions = Omit<z.output<typeof contentSchema>, "sessionId">;
export type ExecuteOptions = Omit<z.output<typeof executeSchema>, "sessionId">;
export type ClickOptions = Omit<z.output<typeof clickSchema>, "sessionId">;
export type TypeOptions = Omit<z.output<typeof typeSchema>, "sessionId">;
export type ElementOptions = Omit<z.output<typeof elementSchema>, "sessionId">;
