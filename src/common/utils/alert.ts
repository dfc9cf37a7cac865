import * as Sentry from '@sentry/nestjs';
import { PinoLogger } from 'nestjs-pino';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Operator-visible failure: logged at error with `alert: true` and captured by Sentry.
 */
export function raiseAlert(
  logger: PinoLogger,
  message: string,
  error: unknown,
  context: { tenantId: string } & Record<string, unknown>,
): void {
  const cause = error instanceof Error && error.cause !== undefined ? errorMessage(error.cause) : undefined;
  logger.error({ alert: true, ...context, error: errorMessage(error), cause }, message);

  Sentry.withScope(scope => {
    scope.setTag('tenantId', context.tenantId);
    scope.setTag('alert', message);
    scope.setExtras(context);
    Sentry.captureException(error);
  });
}
