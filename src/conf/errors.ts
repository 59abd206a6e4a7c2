import { AppError, AppErrorOptions } from '../utils/errors';

function formatChain(chain: readonly string[]): string {
  return chain.length > 0 ? ` (chain: ${chain.join(' -> ')})` : '';
}

/**
 * Base class for every failure of the include/variable pipeline and the
 * configuration tree. `chain` lists the sources or variable names that led
 * to the failure, outermost first.
 */
export class ConfigurationError extends AppError {
  public readonly chain: readonly string[];

  constructor(message: string, code: string = 'CONFIG_ERROR', chain: readonly string[] = [], options: AppErrorOptions = {}) {
    super(`${message}${formatChain(chain)}`, code, options);
    this.name = 'ConfigurationError';
    this.chain = Object.freeze([...chain]);
  }
}

export class PathEscapeError extends ConfigurationError {
  constructor(
    public readonly target: string,
    public readonly resolvedPath: string,
    public readonly rootPath: string,
    chain: readonly string[]
  ) {
    super(`Include target "${target}" resolves to "${resolvedPath}" outside of root "${rootPath}"`, 'PATH_ESCAPE', chain);
    this.name = 'PathEscapeError';
  }
}

export class InvalidIncludeError extends ConfigurationError {
  constructor(public readonly directive: string, chain: readonly string[]) {
    super(`Include directive "${directive}" has no target`, 'INVALID_INCLUDE', chain);
    this.name = 'InvalidIncludeError';
  }
}

export class IncludeDepthExceededError extends ConfigurationError {
  constructor(public readonly maxDepth: number, chain: readonly string[]) {
    super(`Include nesting exceeds the maximum depth of ${maxDepth}`, 'INCLUDE_DEPTH_EXCEEDED', chain);
    this.name = 'IncludeDepthExceededError';
  }
}

export class IncludeReadError extends ConfigurationError {
  constructor(public readonly path: string, chain: readonly string[], cause: unknown) {
    super(
      `Could not read configuration source "${path}": ${cause instanceof Error ? cause.message : String(cause)}`,
      'INCLUDE_READ_FAILED',
      chain,
      { cause }
    );
    this.name = 'IncludeReadError';
  }
}

export class VariableDepthExceededError extends ConfigurationError {
  constructor(public readonly maxDepth: number, chain: readonly string[]) {
    super(`Variable expansion exceeds the maximum depth of ${maxDepth}`, 'VARIABLE_DEPTH_EXCEEDED', chain);
    this.name = 'VariableDepthExceededError';
  }
}

export class UnresolvedVariableError extends ConfigurationError {
  constructor(public readonly variable: string, chain: readonly string[]) {
    super(`Variable "${variable}" is not defined`, 'UNRESOLVED_VARIABLE', chain);
    this.name = 'UnresolvedVariableError';
  }
}

export class ConfigReadError extends ConfigurationError {
  constructor(public readonly source: string, reason: string, cause?: unknown) {
    super(`Could not read configuration tree from "${source}": ${reason}`, 'CONFIG_READ_FAILED', [], { cause });
    this.name = 'ConfigReadError';
  }
}

export class ConfigValueError extends ConfigurationError {
  constructor(public readonly nodePath: string, public readonly value: string, expected: string) {
    super(`Value "${value}" at "${nodePath}" is not a valid ${expected}`, 'INVALID_CONFIG_VALUE');
    this.name = 'ConfigValueError';
  }
}

export class ConfigNodeNotFoundError extends ConfigurationError {
  constructor(public readonly nodePath: string) {
    super(`Required configuration node "${nodePath}" was not found`, 'CONFIG_NODE_NOT_FOUND');
    this.name = 'ConfigNodeNotFoundError';
  }
}
