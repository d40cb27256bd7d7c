/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const ProgressConfigSchema = z.object({
  // Used only to size the progress indicator; pages may hold fewer records
  expectedPerPage: z.number().int().positive(),
});

export const HttpConfigSchema = z.object({
  timeout: z.number().int().nonnegative(), // In milliseconds (0 disables)
  // Reject non-2xx probe/download responses instead of saving the body
  checkStatus: z.boolean(),
});

export const RetryConfigSchema = z.object({
  // null retries forever
  maxAttempts: z.number().int().positive().nullable(),
  backoff: z.enum(["none", "fixed", "exponential"]),
  delay: z.number().int().nonnegative(), // In milliseconds
  maxDelay: z.number().int().nonnegative(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const DownloaderConfigSchema = z.object({
  endpoint: z.string().url(),
  pageCount: z.number().int().nonnegative(),
  output: z.string().min(1),
  progress: ProgressConfigSchema,
  http: HttpConfigSchema,
  retry: RetryConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialDownloaderConfigSchema = DownloaderConfigSchema.partial()
  .extend({
    progress: ProgressConfigSchema.partial().optional(),
    http: HttpConfigSchema.partial().optional(),
    retry: RetryConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type ProgressConfig = z.infer<typeof ProgressConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type DownloaderConfig = z.infer<typeof DownloaderConfigSchema>;
export type PartialDownloaderConfig = z.infer<
  typeof PartialDownloaderConfigSchema
>;
