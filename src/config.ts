import dotenv from 'dotenv';
import { SettingsError } from './utils/errors';
import { LOG_LEVELS, LogLevel } from './utils/logger';
import { MissingVariablePolicy } from './conf/VariableExpander';
import { DuplicatePolicy } from './core/container/IContainer';

// 加载环境变量
dotenv.config();

export interface Settings {
  app: {
    id: string | undefined;
    environment: string;
    logLevel: LogLevel;
  };
  conf: {
    root: string;
    entry: string | undefined;
    missingVariables: MissingVariablePolicy;
    environmentScope: boolean;
  };
  container: {
    duplicatePolicy: DuplicatePolicy;
  };
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function validateChoice<T extends string>(
  key: string,
  value: string | undefined,
  choices: readonly T[],
  fallback: T
): T {
  const normalized = optional(value)?.toLowerCase();
  if (normalized === undefined) {
    return fallback;
  }
  const match = choices.find(choice => choice === normalized);
  if (match === undefined) {
    throw new SettingsError(`Invalid value for ${key}: "${value}" (expected one of ${choices.join(', ')})`);
  }
  return match;
}

function validateFlag(key: string, value: string | undefined): boolean {
  const normalized = optional(value)?.toLowerCase();
  if (normalized === undefined) {
    return false;
  }
  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new SettingsError(`Invalid boolean for ${key}: "${value}"`);
}

/**
 * Builds typed settings from an environment map (defaults to `process.env`).
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    app: {
      id: optional(env.APP_ID),
      environment: (optional(env.APP_ENVIRONMENT) ?? 'local').toLowerCase(),
      logLevel: validateChoice('LOG_LEVEL', env.LOG_LEVEL, LOG_LEVELS, 'info'),
    },
    conf: {
      root: optional(env.CONFIG_ROOT) ?? './conf',
      entry: optional(env.CONFIG_ENTRY),
      missingVariables: validateChoice(
        'CONFIG_MISSING_VARIABLES',
        env.CONFIG_MISSING_VARIABLES,
        [MissingVariablePolicy.FAIL, MissingVariablePolicy.EMPTY],
        MissingVariablePolicy.FAIL
      ),
      environmentScope: validateFlag('CONFIG_ENV_SCOPE', env.CONFIG_ENV_SCOPE),
    },
    container: {
      duplicatePolicy: validateChoice(
        'CONTAINER_DUPLICATE_POLICY',
        env.CONTAINER_DUPLICATE_POLICY,
        [DuplicatePolicy.REPLACE, DuplicatePolicy.REJECT],
        DuplicatePolicy.REPLACE
      ),
    },
  };
}

export const settings: Settings = loadSettings();
