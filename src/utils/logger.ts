// src/utils/logger.ts
import { randomUUID } from 'crypto';

type LogLevel = 'info' | 'warn' | 'error';

export function createContextId(scope: string): string {
  return `${scope}:${randomUUID()}`;
}

/**
 * Best-effort message extraction for anything thrown.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

function write(
  level: LogLevel,
  ctx: string,
  msg: string,
  meta: Record<string, unknown>
): void {
  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    ctx,
    msg,
    meta
  });

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(
  ctx: string,
  msg: string,
  meta: Record<string, unknown> = {}
): void {
  write('info', ctx, msg, meta);
}

export function logWarn(
  ctx: string,
  msg: string,
  meta: Record<string, unknown> = {}
): void {
  write('warn', ctx, msg, meta);
}

export function logError(
  ctx: string,
  msg: string,
  meta: Record<string, unknown> = {}
): void {
  write('error', ctx, msg, meta);
}

/**
 * Dedicated bot API error logger.
 * Extracts method, status code and the API's description.
 */
export function logBotApiError(
  ctx: string,
  method: string,
  details: { status?: number; description?: string; message: string }
): void {
  write('error', ctx, `Bot API ${method} error`, {
    method,
    status: details.status,
    description: details.description,
    message: details.message
  });
}
