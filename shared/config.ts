import { z } from 'zod';

export const DEFAULT_ALLOWED_ORIGINS = [
  'http://localhost:5173',
  'http://localhost:3000',
  'http://127.0.0.1:5173',
];

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    allowedOrigins: z.array(z.string().min(1)),
  }),
  unfurl: z.object({
    timeoutMs: z.number().int().positive(),
    maxContentLength: z.number().int().positive(),
    userAgent: z.string().min(1),
    blockPrivateHosts: z.boolean(),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  unfurl: {
    timeoutMs: number;
    maxContentLength: number;
  };
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  unfurl: {
    timeoutMs: config.unfurl.timeoutMs,
    maxContentLength: config.unfurl.maxContentLength,
  },
});
