import { z } from 'zod';

const OutputSchema = z.object({
  pretty: z.boolean().optional(),
  indent: z.number().int().min(0).max(16).optional(),
});

const LoggingSchema = z.object({
  level: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
  format: z.enum(['text', 'json']).optional(),
});

export const QuirksConfigOverlaySchema = z.object({
  source: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
  output: OutputSchema.optional(),
  logging: LoggingSchema.optional(),
});

export const QuirksConfigSchema = QuirksConfigOverlaySchema.extend({
  /** Path of the quirks document, relative to the config file. */
  source: z.string().min(1),
  profiles: z.record(QuirksConfigOverlaySchema).optional(),
});

export type OutputConfig = z.infer<typeof OutputSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
export type QuirksConfigOverlay = z.infer<typeof QuirksConfigOverlaySchema>;
export type QuirksConfig = z.infer<typeof QuirksConfigSchema>;
