import {
  ENV_PREFIX,
  MAX_NESTING_DEPTH,
  REQUIRED_ENV_PREFIX,
  VARIABLE_END,
  VARIABLE_ESCAPE,
  VARIABLE_START
} from './constants';
import { UnresolvedVariableError, VariableDepthExceededError } from './errors';
import { VariableScope } from './VariableScope';

/**
 * What happens to a `$(name)` reference with no binding in any scope level.
 */
export enum MissingVariablePolicy {
  FAIL = 'fail',
  EMPTY = 'empty'
}

export interface VariableExpanderOptions {
  maxDepth?: number;
  missing?: MissingVariablePolicy;
  env?: NodeJS.ProcessEnv;
}

/**
 * Expands `$(name)` references against a {@link VariableScope}.
 *
 * - `$(~NAME)` reads the environment, empty when unset
 * - `$(~!NAME)` reads the environment and fails when unset
 * - `$$(` is emitted as a literal `$(`
 *
 * A substituted value is expanded again before it is spliced in, so
 * `$(a)` -> `$(b)` -> `value` chains resolve. Each hop counts against
 * `maxDepth`.
 */
export class VariableExpander {
  private readonly maxDepth: number;
  private readonly missing: MissingVariablePolicy;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: VariableExpanderOptions = {}) {
    this.maxDepth = options.maxDepth ?? MAX_NESTING_DEPTH;
    this.missing = options.missing ?? MissingVariablePolicy.FAIL;
    this.env = options.env ?? process.env;
  }

  expand(text: string, scope: VariableScope): string {
    return this.expandAt(text, scope, 0, []);
  }

  private expandAt(text: string, scope: VariableScope, depth: number, chain: readonly string[]): string {
    let result = '';
    let index = 0;

    while (index < text.length) {
      const start = text.indexOf('$', index);
      if (start < 0) {
        result += text.slice(index);
        break;
      }
      result += text.slice(index, start);

      if (text.startsWith(VARIABLE_ESCAPE, start)) {
        result += VARIABLE_START;
        index = start + VARIABLE_ESCAPE.length;
        continue;
      }

      if (text.startsWith(VARIABLE_START, start)) {
        const end = text.indexOf(VARIABLE_END, start + VARIABLE_START.length);
        if (end < 0) {
          // unterminated reference stays literal
          result += text.slice(start);
          break;
        }
        const name = text.slice(start + VARIABLE_START.length, end).trim();
        result += this.substitute(name, scope, depth, chain);
        index = end + VARIABLE_END.length;
        continue;
      }

      result += '$';
      index = start + 1;
    }

    return result;
  }

  private substitute(name: string, scope: VariableScope, depth: number, chain: readonly string[]): string {
    const nextChain = [...chain, name];
    if (depth + 1 > this.maxDepth) {
      throw new VariableDepthExceededError(this.maxDepth, nextChain);
    }

    const value = this.lookup(name, scope, nextChain);
    return this.expandAt(value, scope, depth + 1, nextChain);
  }

  private lookup(name: string, scope: VariableScope, chain: readonly string[]): string {
    if (name.startsWith(REQUIRED_ENV_PREFIX)) {
      const value = this.env[name.slice(REQUIRED_ENV_PREFIX.length)];
      if (value === undefined) {
        throw new UnresolvedVariableError(name, chain);
      }
      return value;
    }

    if (name.startsWith(ENV_PREFIX)) {
      return this.env[name.slice(ENV_PREFIX.length)] ?? '';
    }

    const value = scope.lookup(name);
    if (value !== undefined) {
      return value;
    }
    if (this.missing === MissingVariablePolicy.EMPTY) {
      return '';
    }
    throw new UnresolvedVariableError(name, chain);
  }
}
