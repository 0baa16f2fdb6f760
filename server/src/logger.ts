import winston from 'winston';

const { combine, timestamp, errors, printf } = winston.format;

const line = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(ts)} ${level.toUpperCase().padEnd(5)} ${String(message)}${extra}${trace}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: combine(timestamp(), errors({ stack: true }), line),
  transports: [new winston.transports.Console()],
});

/** Flatten an unknown thrown value into log metadata. */
export function errorMeta(err: unknown): { error: string } {
  return { error: err instanceof Error ? err.message : String(err) };
}
