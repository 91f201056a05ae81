/**
 * Sentry Error Tracking Configuration
 *
 * Set the SENTRY_DSN environment variable to enable Sentry.
 * Without a DSN, Sentry will be disabled and errors will only be logged.
 */

import * as Sentry from '@sentry/node';
import * as functions from 'firebase-functions';
import { sentryConfig } from '../config';

let isInitialized = false;

/**
 * Initialize Sentry once per process.
 */
export function initSentry(): void {
    if (isInitialized) {
        return;
    }

    if (!sentryConfig.dsn) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        isInitialized = true;
        return;
    }

    Sentry.init({
        dsn: sentryConfig.dsn,
        environment: sentryConfig.environment,
        enabled: sentryConfig.environment !== 'test',

        // Evaluations carry patient medication data; never ship request payloads
        beforeSend(event) {
            if (event.request?.data) {
                event.request.data = '[REDACTED]';
            }
            if (event.extra) {
                delete event.extra.records;
            }
            return event;
        },
    });

    functions.logger.info('[sentry] Sentry initialized successfully');
    isInitialized = true;
}

/**
 * Capture an exception and send to Sentry.
 * Also logs to the functions logger.
 */
export function captureException(
    error: unknown,
    context?: Record<string, unknown>
): string | undefined {
    functions.logger.error('[error]', error);

    if (!sentryConfig.dsn) {
        return undefined;
    }

    if (context) {
        return Sentry.withScope((scope) => {
            Object.entries(context).forEach(([key, value]) => {
                scope.setExtra(key, value);
            });
            return Sentry.captureException(error);
        });
    }

    return Sentry.captureException(error);
}
