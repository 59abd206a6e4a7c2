import { JsonConfigReader } from '../../src/conf/JsonConfigReader';
import { ResolvedConfig } from '../../src/conf/ConfigurationAssembler';
import { ConfigReadError } from '../../src/conf/errors';

function resolved(text: string): ResolvedConfig {
  return { source: 'app.json', rootPath: '/cfg', text, includes: [] };
}

describe('JsonConfigReader', () => {
  const reader = new JsonConfigReader();

  test('should read blank text as an empty root section', () => {
    const tree = reader.read(resolved('  \n'));

    expect(tree.root.exists).toBe(true);
    expect(tree.root.name).toBe('config');
    expect(tree.root.children).toHaveLength(0);
    expect(tree.root.attributes).toHaveLength(0);
  });

  test('should map objects to sections and scalars to attributes', () => {
    const tree = reader.read(resolved(JSON.stringify({
      'app-id': 'billing',
      db: { host: 'db.local', port: 5432, ssl: true, password: null }
    })));

    expect(tree.root.attr('app-id').value).toBe('billing');
    const db = tree.root.child('db');
    expect(db.exists).toBe(true);
    expect(db.attr('host').value).toBe('db.local');
    expect(db.attr('port').value).toBe('5432');
    expect(db.attr('ssl').value).toBe('true');
    expect(db.attr('password').exists).toBe(true);
    expect(db.attr('password').value).toBeUndefined();
  });

  test('should map arrays to repeated sections named after the key', () => {
    const tree = reader.read(resolved(JSON.stringify({
      server: [{ name: 'a' }, { name: 'b' }],
      tags: ['red', 'blue']
    })));

    const names = tree.root.children.map(node => node.name);
    expect(names).toEqual(['server', 'server', 'tags', 'tags']);
    expect(tree.root.childAt(1).attr('name').value).toBe('b');
    expect(tree.root.childAt(3).value).toBe('blue');
  });

  test('should use a custom root name', () => {
    const tree = new JsonConfigReader('app').read(resolved('{}'));

    expect(tree.root.name).toBe('app');
  });

  test('should produce a read-only tree', () => {
    const tree = reader.read(resolved('{"a": 1}'));

    expect(tree.isReadOnly).toBe(true);
    expect(() => tree.root.addAttribute('b', '2')).toThrow('Configuration tree is read-only');
  });

  test('should reject invalid JSON', () => {
    expect(() => reader.read(resolved('{ nope'))).toThrow(ConfigReadError);
  });

  test('should reject a root that is not an object', () => {
    let caught: unknown;
    try {
      reader.read(resolved('[1, 2]'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigReadError);
    expect(caught).toHaveErrorCode('CONFIG_READ_FAILED');
    if (caught instanceof ConfigReadError) {
      expect(caught.message).toBe('Could not read configuration tree from "app.json": root value must be an object');
    }
  });
});
