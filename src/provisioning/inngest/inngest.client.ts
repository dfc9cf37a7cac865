import { EventSchemas, Inngest } from 'inngest';

export const INNGEST_CLIENT = Symbol('INNGEST_CLIENT');

export const PROVISION_REQUESTED = 'tenant/provision.requested';
export const STORE_DESTRUCTION_REQUESTED = 'tenant/store.destroy.requested';

export interface TenantJobData {
  tenantId: string;
}

type TenantJobEvents = {
  [PROVISION_REQUESTED]: { data: TenantJobData };
  [STORE_DESTRUCTION_REQUESTED]: { data: TenantJobData };
};

/**
 * Durable job client for tenant lifecycle work. Keys come from
 * INNGEST_EVENT_KEY and INNGEST_SIGNING_KEY; INNGEST_DEV=1 targets a local
 * dev server instead of Inngest Cloud.
 */
export const inngest = new Inngest({
  id: 'tenant-switchboard',
  schemas: new EventSchemas().fromRecord<TenantJobEvents>(),
});

export type TenantJobsClient = typeof inngest;

export interface InngestStepContext {
  run: (name: string, fn: () => Promise<unknown>) => Promise<unknown>;
}

export interface TenantJobEvent {
  data: TenantJobData;
}

export interface TenantJobContext {
  event: TenantJobEvent;
  step: InngestStepContext;
  /** Zero-based attempt of the current step. */
  attempt: number;
}

export interface TenantJobFailureContext {
  event: { data: { event: TenantJobEvent } };
  error: Error;
  step: InngestStepContext;
}

const RETRY_COUNTS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20] as const;

export type RetryCount = (typeof RETRY_COUNTS)[number];

/** Retries after the first attempt, within what the job runner accepts. */
export function retriesFor(maxAttempts: number): RetryCount {
  return RETRY_COUNTS[Math.min(RETRY_COUNTS.length - 1, Math.max(0, Math.floor(maxAttempts) - 1))];
}
