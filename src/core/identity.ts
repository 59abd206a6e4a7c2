import { randomUUID } from 'crypto';
import os from 'os';

export const DEFAULT_APP_ID = 'app';
export const DEFAULT_ENVIRONMENT = 'local';
export const ENVIRONMENT_VARIABLE = 'APP_ENVIRONMENT';

/**
 * Who is running: stamped on log records and exposed by the application
 * context. Immutable once the context is ready.
 */
export interface ApplicationIdentity {
  readonly appId: string;
  readonly instanceId: string;
  /** Short form of the instance id used in log records. */
  readonly instanceTag: string;
  readonly environmentName: string;
  readonly hostName: string;
  readonly startedAt: Date;
}

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Explicit name, else `APP_ENVIRONMENT`, else `local`; always lower case.
 */
export function resolveEnvironmentName(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  return (nonBlank(explicit) ?? nonBlank(env[ENVIRONMENT_VARIABLE]) ?? DEFAULT_ENVIRONMENT).toLowerCase();
}

export function createInstanceId(): { instanceId: string; instanceTag: string } {
  const instanceId = randomUUID().replace(/-/g, '');
  return { instanceId, instanceTag: instanceId.slice(0, 8) };
}

export function createIdentity(appId: string | undefined, environmentName: string, startedAt: Date = new Date()): ApplicationIdentity {
  return Object.freeze({
    appId: nonBlank(appId) ?? DEFAULT_APP_ID,
    ...createInstanceId(),
    environmentName,
    hostName: os.hostname(),
    startedAt
  });
}
