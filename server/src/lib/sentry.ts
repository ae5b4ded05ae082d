import { createRequire } from 'node:module';
import logger from './logger.js';

/**
 * Optional error reporting. @sentry/node is an optional dependency loaded on
 * first use; without it, or without SENTRY_DSN, every call is a no-op.
 */

interface ReportScope {
  setExtra(key: string, value: unknown): void;
  setTag(key: string, value: string): void;
}

export interface ReportEvent {
  extra?: unknown;
  breadcrumbs?: unknown;
}

interface SentryClient {
  init(options: {
    dsn: string;
    environment?: string;
    tracesSampleRate?: number;
    beforeSend?: (event: ReportEvent) => ReportEvent | null;
  }): void;
  withScope(callback: (scope: ReportScope) => void): void;
  captureException(err: unknown): void;
  flush(timeoutMs?: number): Promise<unknown>;
}

const CLIENT_METHODS = ['init', 'withScope', 'captureException', 'flush'];

/** Env values that must never leave the process in an event. */
const SECRET_ENV_KEYS = new Set([
  'SUPABASE_SERVICE_ROLE_KEY',
  'STAGE_ADAPTER_API_KEY',
  'REDIS_URL',
  'SENTRY_DSN',
  'METRICS_KEY',
]);
const SECRET_FIELD_RE = /key|token|secret|password|authorization/i;

/** Context keys promoted to searchable tags. */
const TAG_KEYS = new Set(['consumer', 'phase', 'source', 'stage']);

const require = createRequire(import.meta.url);
let client: SentryClient | null | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSentryClient(value: unknown): value is SentryClient {
  return isRecord(value) && CLIENT_METHODS.every((method) => typeof value[method] === 'function');
}

function loadClient(): SentryClient | null {
  if (client !== undefined) return client;
  try {
    const loaded: unknown = require('@sentry/node');
    client = isSentryClient(loaded) ? loaded : null;
  } catch (err) {
    logger.debug({ err }, '@sentry/node could not be loaded');
    client = null;
  }
  return client;
}

function redact(record: Record<string, unknown>, matches: (key: string) => boolean): void {
  for (const key of Object.keys(record)) {
    if (matches(key)) record[key] = '[REDACTED]';
  }
}

/** Redacts secret env values in extras and credential-like breadcrumb data. */
export function scrubEvent<E extends ReportEvent>(event: E): E {
  if (isRecord(event.extra)) {
    redact(event.extra, (key) => SECRET_ENV_KEYS.has(key));
  }
  if (Array.isArray(event.breadcrumbs)) {
    for (const crumb of event.breadcrumbs) {
      if (isRecord(crumb) && isRecord(crumb.data)) {
        redact(crumb.data, (key) => SECRET_FIELD_RE.test(key));
      }
    }
  }
  return event;
}

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set, error reporting disabled');
    return;
  }
  const sentry = loadClient();
  if (!sentry) {
    logger.warn('SENTRY_DSN set but @sentry/node is not installed; continuing without error reporting');
    return;
  }

  sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0,
    beforeSend: scrubEvent,
  });
  logger.info('Error reporting enabled');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!process.env.SENTRY_DSN) return;
  const sentry = loadClient();
  if (!sentry) return;

  sentry.withScope((scope) => {
    for (const [key, value] of Object.entries(context ?? {})) {
      if (TAG_KEYS.has(key) && typeof value === 'string') scope.setTag(key, value);
      else scope.setExtra(key, value);
    }
    sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!process.env.SENTRY_DSN) return;
  const sentry = loadClient();
  if (!sentry) return;
  try {
    await sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err }, 'Error reporting flush failed during shutdown');
  }
}
