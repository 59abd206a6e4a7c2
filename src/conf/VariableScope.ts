export type VariableMap = Readonly<Record<string, string>>;

/**
 * Immutable chain of variable bindings. Lookups walk from this level out to
 * the root level and the first binding wins.
 */
export class VariableScope {
  private readonly vars: ReadonlyMap<string, string>;

  private constructor(vars: Iterable<readonly [string, string]>, public readonly parent: VariableScope | null) {
    this.vars = new Map(vars);
  }

  static empty(): VariableScope {
    return new VariableScope([], null);
  }

  static from(vars: VariableMap, parent: VariableScope | null = null): VariableScope {
    return new VariableScope(Object.entries(vars), parent);
  }

  /**
   * Root level built from an environment map; unset entries are skipped.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv): VariableScope {
    const entries: Array<[string, string]> = [];
    for (const [name, value] of Object.entries(env)) {
      if (value !== undefined) {
        entries.push([name, value]);
      }
    }
    return new VariableScope(entries, null);
  }

  child(vars: VariableMap): VariableScope {
    return VariableScope.from(vars, this);
  }

  lookup(name: string): string | undefined {
    let scope: VariableScope | null = this;
    while (scope) {
      const value = scope.vars.get(name);
      if (value !== undefined) {
        return value;
      }
      scope = scope.parent;
    }
    return undefined;
  }
}
