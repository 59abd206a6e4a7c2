import path from 'path';
import { log } from '../utils/logger';
import { MAX_NESTING_DEPTH } from './constants';
import { IncludeReadError, PathEscapeError } from './errors';
import { confinePath, IncludeResolver, resolveRealPath } from './IncludeResolver';
import { FileSystemSourceReader, ISourceReader, RawSource } from './SourceReader';
import { MissingVariablePolicy, VariableExpander } from './VariableExpander';
import { VariableMap, VariableScope } from './VariableScope';

export type ConfigEntry =
  | { kind: 'file'; path: string; optional?: boolean }
  | { kind: 'text'; text: string; id?: string };

export interface AssembleRequest {
  rootPath: string;
  /** A bare string names an entry file relative to the root. */
  entry: ConfigEntry | string;
  vars?: VariableMap;
}

/**
 * Fully resolved configuration text. Frozen once produced.
 */
export interface ResolvedConfig {
  readonly source: string;
  readonly rootPath: string;
  readonly text: string;
  readonly includes: readonly string[];
}

export interface AssemblerOptions {
  reader?: ISourceReader;
  maxDepth?: number;
  missingVariables?: MissingVariablePolicy;
  /** Adds the process environment as the outermost scope level. */
  environmentScope?: boolean;
  env?: NodeJS.ProcessEnv;
}

const TEXT_SOURCE_ID = '<text>';

/**
 * Runs include resolution, then variable expansion over the whole included
 * text. The first failure aborts the assembly.
 */
export class ConfigurationAssembler {
  private readonly reader: ISourceReader;
  private readonly includes: IncludeResolver;
  private readonly expander: VariableExpander;
  private readonly environmentScope: boolean;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: AssemblerOptions = {}) {
    const maxDepth = options.maxDepth ?? MAX_NESTING_DEPTH;
    this.reader = options.reader ?? new FileSystemSourceReader();
    this.env = options.env ?? process.env;
    this.environmentScope = options.environmentScope ?? false;
    this.includes = new IncludeResolver({ maxDepth, reader: this.reader });
    this.expander = new VariableExpander({ maxDepth, missing: options.missingVariables, env: this.env });
  }

  async assemble(request: AssembleRequest): Promise<ResolvedConfig> {
    const rootPath = path.resolve(request.rootPath);
    const entry: ConfigEntry = typeof request.entry === 'string'
      ? { kind: 'file', path: request.entry }
      : request.entry;

    try {
      const source = await this.loadEntry(rootPath, entry);
      const included = await this.includes.resolve(source, rootPath);
      const text = this.expander.expand(included.text, this.createScope(request.vars ?? {}));

      log.debug('Configuration assembled', {
        source: source.id,
        includes: included.includes.length,
        length: text.length
      });

      return Object.freeze({
        source: source.id,
        rootPath,
        text,
        includes: Object.freeze([...included.includes])
      });
    } catch (error) {
      log.error('Configuration assembly failed', {
        rootPath,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  }

  private createScope(vars: VariableMap): VariableScope {
    const outer = this.environmentScope ? VariableScope.fromEnvironment(this.env) : VariableScope.empty();
    return outer.child(vars);
  }

  private async loadEntry(rootPath: string, entry: ConfigEntry): Promise<RawSource> {
    if (entry.kind === 'text') {
      return { id: entry.id ?? TEXT_SOURCE_ID, text: entry.text };
    }

    const confined = confinePath(rootPath, entry.path);
    if (!confined) {
      throw new PathEscapeError(entry.path, path.resolve(rootPath, entry.path), rootPath, [entry.path]);
    }

    if (entry.optional && !(await this.reader.exists(confined.resolved))) {
      log.debug('Optional configuration entry not found, using empty text', { path: confined.resolved });
      return { id: confined.relative, text: '' };
    }

    let real: { realPath: string; inside: boolean };
    try {
      real = await resolveRealPath(this.reader, rootPath, confined.resolved);
    } catch (error) {
      throw new IncludeReadError(confined.resolved, [confined.relative], error);
    }
    if (!real.inside) {
      throw new PathEscapeError(entry.path, real.realPath, rootPath, [entry.path]);
    }

    try {
      return { id: confined.relative, text: await this.reader.read(real.realPath) };
    } catch (error) {
      throw new IncludeReadError(confined.resolved, [confined.relative], error);
    }
  }
}

/**
 * One-shot assembly with a fresh {@link ConfigurationAssembler}.
 */
export function assembleConfig(
  rootPath: string,
  entry: ConfigEntry | string,
  vars: VariableMap = {},
  options: AssemblerOptions = {}
): Promise<ResolvedConfig> {
  return new ConfigurationAssembler(options).assemble({ rootPath, entry, vars });
}
