import path from 'path';
import { INCLUDE_PATTERN, MAX_NESTING_DEPTH } from './constants';
import {
  IncludeDepthExceededError,
  IncludeReadError,
  InvalidIncludeError,
  PathEscapeError
} from './errors';
import { FileSystemSourceReader, ISourceReader, RawSource } from './SourceReader';

export interface IncludeResolverOptions {
  maxDepth?: number;
  reader?: ISourceReader;
}

export interface IncludeResult {
  text: string;
  /** Included sources relative to the root, in depth-first order. */
  includes: string[];
}

/**
 * Canonical absolute path of `target` under `rootPath`, or null when it does
 * not name something strictly inside the root.
 */
export function confinePath(rootPath: string, target: string): { resolved: string; relative: string } | null {
  const root = path.resolve(rootPath);
  const resolved = path.resolve(root, target);
  const relative = path.relative(root, resolved);

  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return { resolved, relative: relative.split(path.sep).join('/') };
}

/**
 * Canonical path of `candidate` with symbolic links resolved, and whether it
 * still lies strictly inside the canonical root.
 */
export async function resolveRealPath(
  reader: ISourceReader,
  rootPath: string,
  candidate: string
): Promise<{ realPath: string; inside: boolean }> {
  const [realRoot, realPath] = await Promise.all([reader.realpath(path.resolve(rootPath)), reader.realpath(candidate)]);
  return { realPath, inside: confinePath(realRoot, realPath) !== null };
}

/**
 * Splices `#include<target>` directives with the content of the named files,
 * recursively. Targets are relative to the root and may never leave it,
 * neither lexically nor through a symbolic link.
 * Nesting depth is the only cycle guard.
 */
export class IncludeResolver {
  private readonly maxDepth: number;
  private readonly reader: ISourceReader;

  constructor(options: IncludeResolverOptions = {}) {
    this.maxDepth = options.maxDepth ?? MAX_NESTING_DEPTH;
    this.reader = options.reader ?? new FileSystemSourceReader();
  }

  async resolve(source: RawSource, rootPath: string): Promise<IncludeResult> {
    const includes: string[] = [];
    const text = await this.expand(source.text, rootPath, 0, [source.id], includes);
    return { text, includes };
  }

  private async expand(
    text: string,
    rootPath: string,
    depth: number,
    chain: readonly string[],
    includes: string[]
  ): Promise<string> {
    let result = '';
    let index = 0;

    for (const match of text.matchAll(INCLUDE_PATTERN)) {
      const start = match.index ?? 0;
      result += text.slice(index, start);
      result += await this.include(match[0], match[1], rootPath, depth, chain, includes);
      index = start + match[0].length;
    }

    return result + text.slice(index);
  }

  private async include(
    directive: string,
    rawTarget: string,
    rootPath: string,
    depth: number,
    chain: readonly string[],
    includes: string[]
  ): Promise<string> {
    const target = rawTarget.trim();
    if (target === '') {
      throw new InvalidIncludeError(directive, chain);
    }

    const confined = confinePath(rootPath, target);
    if (!confined) {
      throw new PathEscapeError(target, path.resolve(rootPath, target), path.resolve(rootPath), [...chain, target]);
    }

    const nextChain = [...chain, confined.relative];
    if (depth + 1 > this.maxDepth) {
      throw new IncludeDepthExceededError(this.maxDepth, nextChain);
    }

    let real: { realPath: string; inside: boolean };
    try {
      real = await resolveRealPath(this.reader, rootPath, confined.resolved);
    } catch (error) {
      throw new IncludeReadError(confined.resolved, nextChain, error);
    }
    if (!real.inside) {
      throw new PathEscapeError(target, real.realPath, path.resolve(rootPath), [...chain, target]);
    }

    let content: string;
    try {
      content = await this.reader.read(real.realPath);
    } catch (error) {
      throw new IncludeReadError(confined.resolved, nextChain, error);
    }

    includes.push(confined.relative);
    return this.expand(content, rootPath, depth + 1, nextChain, includes);
  }
}
