/**
 * config/sentry.ts — Sentry error tracking (opt-in)
 *
 * Enable by setting SENTRY_DSN in environment.
 * When disabled, all functions are no-ops and @sentry/node is never loaded.
 */
import type { ErrorRequestHandler } from 'express';
import { env } from './env.ts';
import { childLogger } from '../shared/logger.ts';

type SentryModule = typeof import('@sentry/node');

const log = childLogger({ module: 'sentry' });

let Sentry: SentryModule | null = null;

/**
 * Initialize Sentry. Call once at server startup.
 */
export async function initSentry(): Promise<void> {
  const dsn = env.SENTRY_DSN;
  if (!dsn) {
    log.info('Sentry disabled (no SENTRY_DSN)');
    return;
  }

  const mod = await import('@sentry/node');
  mod.init({
    dsn,
    environment: env.NODE_ENV,
    release: process.env.npm_package_version ?? 'unknown',
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers.authorization;
        delete event.request.headers.cookie;
        delete event.request.headers['x-admin-key'];
      }
      return event;
    },
  });

  Sentry = mod;
  log.info('Sentry initialized');
}

/**
 * Capture an exception with optional extra context.
 */
export function captureException(err: unknown, context?: Record<string, unknown>): void {
  if (!Sentry) return;
  const sentry = Sentry;
  if (context) {
    sentry.withScope(scope => {
      for (const [key, value] of Object.entries(context)) scope.setExtra(key, value);
      sentry.captureException(err);
    });
  } else {
    sentry.captureException(err);
  }
}

/**
 * Express error handler. Place before the app's own error handler.
 * Passes the error through untouched when Sentry is not initialized.
 */
export function sentryErrorHandler(): ErrorRequestHandler {
  if (Sentry) return Sentry.expressErrorHandler();
  return (err, _req, _res, next) => next(err);
}

/**
 * Flush pending events before shutdown.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
  if (!Sentry) return;
  await Sentry.flush(timeout);
}
