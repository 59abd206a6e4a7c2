import { MissingVariablePolicy, VariableExpander } from '../../src/conf/VariableExpander';
import { VariableScope } from '../../src/conf/VariableScope';
import { UnresolvedVariableError, VariableDepthExceededError } from '../../src/conf/errors';

function chainScope(length: number, terminal: string): VariableScope {
  const vars: Record<string, string> = {};
  for (let i = 1; i < length; i++) {
    vars[`v${i}`] = `$(v${i + 1})`;
  }
  vars[`v${length}`] = terminal;
  return VariableScope.from(vars);
}

describe('VariableExpander', () => {
  const expander = new VariableExpander({ env: {} });

  describe('substitution', () => {
    test('should return text without references unchanged', () => {
      const text = 'plain = text, with (parens) and a lone $ sign';
      expect(expander.expand(text, VariableScope.empty())).toBe(text);
    });

    test('should substitute references left to right', () => {
      const scope = VariableScope.from({ host: 'db.local', port: '5432' });
      expect(expander.expand('url=$(host):$(port)/x', scope)).toBe('url=db.local:5432/x');
    });

    test('should trim whitespace inside the reference', () => {
      const scope = VariableScope.from({ name: 'value' });
      expect(expander.expand('[$( name )]', scope)).toBe('[value]');
    });

    test('should resolve the innermost binding first', () => {
      const outer = VariableScope.from({ level: 'outer', only: 'outer-only' });
      const inner = outer.child({ level: 'inner' });
      expect(expander.expand('$(level) $(only)', inner)).toBe('inner outer-only');
    });

    test('should re-expand substituted values', () => {
      const scope = VariableScope.from({ a: '$(b)', b: '$(c)!', c: 'X' });
      expect(expander.expand('$(a)', scope)).toBe('X!');
    });

    test('should leave an unterminated reference as literal text', () => {
      const scope = VariableScope.from({ a: '1' });
      expect(expander.expand('$(a) and $(b', scope)).toBe('1 and $(b');
    });
  });

  describe('escape form', () => {
    test('should emit the escaped marker literally', () => {
      const scope = VariableScope.from({ name: 'value' });
      expect(expander.expand('keep $$(name) but expand $(name)', scope)).toBe('keep $(name) but expand value');
    });

    test('should not expand escaped syntax that comes from a variable value', () => {
      const scope = VariableScope.from({ literal: '$$(other)' });
      expect(expander.expand('$(literal)', scope)).toBe('$(other)');
    });
  });

  describe('environment references', () => {
    const envExpander = new VariableExpander({ env: { HOME_DIR: '/home/test' } });

    test('should read environment variables with the ~ prefix', () => {
      expect(envExpander.expand('home=$(~HOME_DIR)', VariableScope.empty())).toBe('home=/home/test');
    });

    test('should yield empty text for a missing optional environment variable', () => {
      expect(envExpander.expand('[$(~MISSING)]', VariableScope.empty())).toBe('[]');
    });

    test('should fail for a missing required environment variable', () => {
      expect(() => envExpander.expand('$(~!MISSING)', VariableScope.empty())).toThrow(UnresolvedVariableError);
    });

    test('should not consult the scope for environment references', () => {
      const scope = VariableScope.from({ HOME_DIR: 'from-scope' });
      expect(envExpander.expand('$(~HOME_DIR)', scope)).toBe('/home/test');
    });
  });

  describe('missing variables', () => {
    test('should fail by default and name the variable and chain', () => {
      const scope = VariableScope.from({ a: 'x $(missing)' });

      let caught: unknown;
      try {
        expander.expand('$(a)', scope);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(UnresolvedVariableError);
      expect(caught).toHaveErrorCode('UNRESOLVED_VARIABLE');
      if (caught instanceof UnresolvedVariableError) {
        expect(caught.variable).toBe('missing');
        expect(caught.chain).toEqual(['a', 'missing']);
        expect(caught.message).toBe('Variable "missing" is not defined (chain: a -> missing)');
      }
    });

    test('should substitute empty text under the empty policy', () => {
      const lenient = new VariableExpander({ env: {}, missing: MissingVariablePolicy.EMPTY });
      expect(lenient.expand('[$(missing)]', VariableScope.empty())).toBe('[]');
    });
  });

  describe('depth bound', () => {
    test('should resolve a chain of ten references', () => {
      expect(expander.expand('$(v1)', chainScope(10, 'X'))).toBe('X');
    });

    test('should fail a chain of eleven references', () => {
      expect(() => expander.expand('$(v1)', chainScope(11, 'X'))).toThrow(VariableDepthExceededError);
    });

    test('should fail a reference cycle at the depth bound', () => {
      const scope = VariableScope.from({ a: '$(b)', b: '$(a)' });

      let caught: unknown;
      try {
        expander.expand('$(a)', scope);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(VariableDepthExceededError);
      if (caught instanceof VariableDepthExceededError) {
        expect(caught.chain).toHaveLength(11);
        expect(caught.chain.slice(0, 3)).toEqual(['a', 'b', 'a']);
      }
    });

    test('should honour a custom maximum depth', () => {
      const shallow = new VariableExpander({ env: {}, maxDepth: 2 });
      expect(shallow.expand('$(v1)', chainScope(2, 'ok'))).toBe('ok');
      expect(() => shallow.expand('$(v1)', chainScope(3, 'ok'))).toThrow(VariableDepthExceededError);
    });

    test('should produce the same result for the same input', () => {
      const scope = VariableScope.from({ a: '$(b)-$(b)', b: 'z' });
      expect(expander.expand('$(a)', scope)).toBe(expander.expand('$(a)', scope));
      expect(expander.expand('$(a)', scope)).toBe('z-z');
    });
  });
});
