export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export const config = {
  port: parseInt(process.env.PORT ?? '3000', 10),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? 'info',

  corsOrigins: parseList(process.env.CORS_ORIGINS ?? 'http://localhost:5173'),
  bodyLimit: parseInt(process.env.BODY_LIMIT_BYTES ?? String(1024 * 1024), 10),

  rateLimit: {
    max: parseInt(process.env.RATE_LIMIT_MAX ?? '100', 10),
    timeWindow: '1 minute',
  },
} as const;
