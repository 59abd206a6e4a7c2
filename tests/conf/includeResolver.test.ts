import { confinePath, IncludeResolver } from '../../src/conf/IncludeResolver';
import {
  IncludeDepthExceededError,
  IncludeReadError,
  InvalidIncludeError,
  PathEscapeError
} from '../../src/conf/errors';
import { MemorySourceReader } from '../helpers/memorySourceReader';

const ROOT = '/cfg';

class LinkedSourceReader extends MemorySourceReader {
  constructor(root: string, files: Record<string, string>, private readonly links: Record<string, string>) {
    super(root, files);
  }

  async realpath(filePath: string): Promise<string> {
    return this.links[filePath] ?? filePath;
  }
}

function nestedFiles(count: number): Record<string, string> {
  const files: Record<string, string> = {};
  for (let i = 1; i < count; i++) {
    files[`f${i}.cfg`] = `#include<f${i + 1}.cfg>`;
  }
  files[`f${count}.cfg`] = 'leaf';
  return files;
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('IncludeResolver', () => {
  describe('confinePath', () => {
    test('should accept targets inside the root', () => {
      expect(confinePath(ROOT, 'sub/../a.cfg')).toEqual({ resolved: '/cfg/a.cfg', relative: 'a.cfg' });
      expect(confinePath(ROOT, 'sub/b.cfg')).toEqual({ resolved: '/cfg/sub/b.cfg', relative: 'sub/b.cfg' });
    });

    test('should reject targets outside or equal to the root', () => {
      expect(confinePath(ROOT, '../../etc/passwd')).toBeNull();
      expect(confinePath(ROOT, '/etc/passwd')).toBeNull();
      expect(confinePath(ROOT, 'sub/../../other.cfg')).toBeNull();
      expect(confinePath(ROOT, '.')).toBeNull();
    });

    test('should not treat a sibling with a common prefix as inside', () => {
      expect(confinePath(ROOT, '../cfg-other/a.cfg')).toBeNull();
    });
  });

  describe('resolve', () => {
    test('should return text without directives unchanged', async () => {
      const reader = new MemorySourceReader(ROOT);
      const resolver = new IncludeResolver({ reader });

      const result = await resolver.resolve({ id: 'main', text: 'a = 1\nb = <2>' }, ROOT);

      expect(result).toEqual({ text: 'a = 1\nb = <2>', includes: [] });
      expect(reader.reads).toEqual([]);
    });

    test('should splice nested includes in depth-first order', async () => {
      const reader = new MemorySourceReader(ROOT, {
        'a.cfg': 'a[#include<b.cfg>]',
        'b.cfg': 'b',
        'c.cfg': 'c'
      });
      const resolver = new IncludeResolver({ reader });

      const result = await resolver.resolve({ id: 'main', text: 'A #include<a.cfg> B #include<c.cfg>' }, ROOT);

      expect(result.text).toBe('A a[b] B c');
      expect(result.includes).toEqual(['a.cfg', 'b.cfg', 'c.cfg']);
    });

    test('should resolve every target against the root', async () => {
      const reader = new MemorySourceReader(ROOT, {
        'sub/x.cfg': 'x+#include<y.cfg>',
        'y.cfg': 'y'
      });
      const resolver = new IncludeResolver({ reader });

      const result = await resolver.resolve({ id: 'main', text: '#include< sub/x.cfg >' }, ROOT);

      expect(result.text).toBe('x+y');
      expect(result.includes).toEqual(['sub/x.cfg', 'y.cfg']);
    });

    test('should include the same file more than once', async () => {
      const reader = new MemorySourceReader(ROOT, { 'part.cfg': 'p' });
      const resolver = new IncludeResolver({ reader });

      const result = await resolver.resolve({ id: 'main', text: '#include<part.cfg>,#include<part.cfg>' }, ROOT);

      expect(result.text).toBe('p,p');
      expect(reader.reads).toEqual(['/cfg/part.cfg', '/cfg/part.cfg']);
    });

    test('should resolve ten levels of nesting', async () => {
      const reader = new MemorySourceReader(ROOT, nestedFiles(10));
      const resolver = new IncludeResolver({ reader });

      const result = await resolver.resolve({ id: 'main', text: '#include<f1.cfg>' }, ROOT);

      expect(result.text).toBe('leaf');
      expect(result.includes).toHaveLength(10);
    });

    test('should fail at the eleventh level of nesting', async () => {
      const reader = new MemorySourceReader(ROOT, nestedFiles(11));
      const resolver = new IncludeResolver({ reader });

      const error = await captureError(resolver.resolve({ id: 'main', text: '#include<f1.cfg>' }, ROOT));

      expect(error).toBeInstanceOf(IncludeDepthExceededError);
      expect(error).toHaveErrorCode('INCLUDE_DEPTH_EXCEEDED');
      expect(reader.reads).not.toContain('/cfg/f11.cfg');
      if (error instanceof IncludeDepthExceededError) {
        expect(error.chain).toHaveLength(12);
        expect(error.chain[0]).toBe('main');
        expect(error.chain[11]).toBe('f11.cfg');
      }
    });

    test('should bound an include cycle by depth', async () => {
      const reader = new MemorySourceReader(ROOT, {
        'a.cfg': '#include<b.cfg>',
        'b.cfg': '#include<a.cfg>'
      });
      const resolver = new IncludeResolver({ reader });

      await expect(resolver.resolve({ id: 'main', text: '#include<a.cfg>' }, ROOT))
        .rejects.toThrow(IncludeDepthExceededError);
      expect(reader.reads).toHaveLength(10);
    });

    test('should reject a target escaping the root without reading it', async () => {
      const reader = new MemorySourceReader(ROOT);
      const resolver = new IncludeResolver({ reader });

      const error = await captureError(resolver.resolve({ id: 'main', text: 'x = #include<../../etc/passwd>' }, ROOT));

      expect(error).toBeInstanceOf(PathEscapeError);
      expect(reader.reads).toEqual([]);
      if (error instanceof PathEscapeError) {
        expect(error.target).toBe('../../etc/passwd');
        expect(error.resolvedPath).toBe('/etc/passwd');
        expect(error.rootPath).toBe('/cfg');
        expect(error.chain).toEqual(['main', '../../etc/passwd']);
      }
    });

    test('should reject an absolute target outside the root', async () => {
      const reader = new MemorySourceReader(ROOT);
      const resolver = new IncludeResolver({ reader });

      await expect(resolver.resolve({ id: 'main', text: '#include</etc/hosts>' }, ROOT))
        .rejects.toThrow(PathEscapeError);
      expect(reader.reads).toEqual([]);
    });

    test('should reject an escape from a nested include', async () => {
      const reader = new MemorySourceReader(ROOT, { 'sub/a.cfg': '#include<../../secret>' });
      const resolver = new IncludeResolver({ reader });

      const error = await captureError(resolver.resolve({ id: 'main', text: '#include<sub/a.cfg>' }, ROOT));

      expect(error).toBeInstanceOf(PathEscapeError);
      expect(reader.reads).toEqual(['/cfg/sub/a.cfg']);
      if (error instanceof PathEscapeError) {
        expect(error.chain).toEqual(['main', 'sub/a.cfg', '../../secret']);
      }
    });

    test('should reject a target whose canonical path leaves the root', async () => {
      const reader = new LinkedSourceReader(ROOT, { 'link.cfg': 'inside' }, { '/cfg/link.cfg': '/etc/passwd' });
      const resolver = new IncludeResolver({ reader });

      const error = await captureError(resolver.resolve({ id: 'main', text: '#include<link.cfg>' }, ROOT));

      expect(error).toBeInstanceOf(PathEscapeError);
      expect(reader.reads).toEqual([]);
      if (error instanceof PathEscapeError) {
        expect(error.resolvedPath).toBe('/etc/passwd');
        expect(error.chain).toEqual(['main', 'link.cfg']);
      }
    });

    test('should read a linked target through its canonical path', async () => {
      const reader = new LinkedSourceReader(ROOT, { 'real/a.cfg': 'linked' }, { '/cfg/a.cfg': '/cfg/real/a.cfg' });
      const resolver = new IncludeResolver({ reader });

      const result = await resolver.resolve({ id: 'main', text: '#include<a.cfg>' }, ROOT);

      expect(result).toEqual({ text: 'linked', includes: ['a.cfg'] });
      expect(reader.reads).toEqual(['/cfg/real/a.cfg']);
    });

    test('should reject an include with an empty target', async () => {
      const resolver = new IncludeResolver({ reader: new MemorySourceReader(ROOT) });

      const error = await captureError(resolver.resolve({ id: 'main', text: 'a #include<  > b' }, ROOT));

      expect(error).toBeInstanceOf(InvalidIncludeError);
      if (error instanceof InvalidIncludeError) {
        expect(error.directive).toBe('#include<  >');
      }
    });

    test('should wrap read failures with the include chain', async () => {
      const reader = new MemorySourceReader(ROOT, { 'a.cfg': '#include<missing.cfg>' });
      const resolver = new IncludeResolver({ reader });

      const error = await captureError(resolver.resolve({ id: 'main', text: '#include<a.cfg>' }, ROOT));

      expect(error).toBeInstanceOf(IncludeReadError);
      expect(error).toHaveErrorCode('INCLUDE_READ_FAILED');
      if (error instanceof IncludeReadError) {
        expect(error.path).toBe('/cfg/missing.cfg');
        expect(error.chain).toEqual(['main', 'a.cfg', 'missing.cfg']);
        expect(error.cause).toBeInstanceOf(Error);
      }
    });

    test('should honour a custom maximum depth', async () => {
      const reader = new MemorySourceReader(ROOT, nestedFiles(3));
      const resolver = new IncludeResolver({ reader, maxDepth: 2 });

      await expect(resolver.resolve({ id: 'main', text: '#include<f1.cfg>' }, ROOT))
        .rejects.toThrow(IncludeDepthExceededError);
    });
  });
});
