import * as Sentry from '@sentry/nestjs';

// Must load before anything else so Sentry can instrument the modules that follow
const sentryDsn = process.env.SENTRY_DSN;
const nodeEnv = process.env.NODE_ENV || 'development';

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-admin-key'];

if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    environment: nodeEnv,
    tracesSampleRate: nodeEnv === 'production' ? 0.25 : 1.0,
    sendDefaultPii: false,

    beforeSend(event) {
      if (event.request?.data) {
        delete event.request.data;
      }

      const headers = event.request?.headers;
      if (headers) {
        SENSITIVE_HEADERS.forEach(header => {
          if (headers[header]) {
            headers[header] = '[REDACTED]';
          }
        });
      }

      return event;
    },
  });

  console.log(`Sentry initialized for ${nodeEnv} environment`);
} else {
  console.log('Sentry DSN not provided, skipping Sentry initialization');
}
