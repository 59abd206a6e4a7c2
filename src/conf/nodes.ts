import { ConfigNodeNotFoundError, ConfigurationError, ConfigValueError } from './errors';

const TRUE_VALUES = new Set(['true', 't', 'yes', 'y', '1', 'on']);
const FALSE_VALUES = new Set(['false', 'f', 'no', 'n', '0', 'off']);

function sameName(left: string, right: string): boolean {
  return left.toLowerCase() === right.toLowerCase();
}

/**
 * Navigable tree of sections and attributes read from resolved
 * configuration text. Lookups never return null: a missing node is one of
 * the two non-existent sentinels.
 */
export class ConfigTree {
  private rootNode: ConfigSectionNode | null = null;
  private sealed = false;
  readonly emptySection: ConfigSectionNode;
  readonly emptyAttribute: ConfigAttributeNode;

  constructor() {
    this.emptySection = new ConfigSectionNode(this, null, '', undefined, false);
    this.emptyAttribute = new ConfigAttributeNode(this, null, '', undefined, false);
  }

  static empty(): ConfigTree {
    return new ConfigTree().seal();
  }

  get root(): ConfigSectionNode {
    return this.rootNode ?? this.emptySection;
  }

  get isReadOnly(): boolean {
    return this.sealed;
  }

  create(rootName: string = 'config', rootValue?: string): ConfigTree {
    this.checkCanModify();
    this.rootNode = new ConfigSectionNode(this, null, rootName, rootValue, true);
    return this;
  }

  /** Makes the tree read-only. */
  seal(): ConfigTree {
    this.sealed = true;
    return this;
  }

  get(path: string): ConfigNode {
    return this.root.navigate(path);
  }

  exists(path: string): boolean {
    return this.get(path).exists;
  }

  /** @internal */
  checkCanModify(): void {
    if (this.sealed) {
      throw new ConfigurationError('Configuration tree is read-only', 'CONFIG_READ_ONLY');
    }
  }
}

export abstract class ConfigNode {
  private nodeName: string;
  private nodeValue: string | undefined;

  protected constructor(
    readonly tree: ConfigTree,
    protected readonly parentNode: ConfigSectionNode | null,
    name: string,
    value: string | undefined,
    readonly exists: boolean
  ) {
    this.nodeName = name.trim();
    this.nodeValue = value;
  }

  abstract readonly isSection: boolean;

  get name(): string {
    return this.nodeName;
  }

  /** Value, with the empty string reported as absent. */
  get value(): string | undefined {
    return this.nodeValue === '' ? undefined : this.nodeValue;
  }

  get parent(): ConfigSectionNode {
    return this.parentNode ?? this.tree.emptySection;
  }

  get isRoot(): boolean {
    return this.parentNode === null;
  }

  get path(): string {
    if (!this.exists) {
      return '';
    }
    if (!this.parentNode) {
      return '/';
    }
    const prefix = this.isSection ? '' : '$';
    const siblings: readonly ConfigNode[] = this.isSection ? this.parentNode.children : this.parentNode.attributes;
    const duplicated = siblings.filter(node => node.isSameName(this.name)).length > 1;
    const segment = duplicated ? `${prefix}[${siblings.indexOf(this)}]` : `${prefix}${this.name}`;
    const parentPath = this.parentNode.path;
    return parentPath === '/' ? `/${segment}` : `${parentPath}/${segment}`;
  }

  rename(name: string): void {
    this.checkCanModify();
    this.nodeName = name.trim();
  }

  setValue(value: string | undefined): void {
    this.checkCanModify();
    this.nodeValue = value;
  }

  isSameName(other: string): boolean {
    return sameName(this.name, other);
  }

  navigate(path: string): ConfigNode {
    return this.parent.navigate(path);
  }

  asString(dflt?: string): string | undefined {
    return this.value ?? dflt;
  }

  asInt(dflt: number = 0): number {
    const text = this.value?.trim();
    if (text === undefined || text === '') {
      return dflt;
    }
    if (/^[+-]?\d+$/.test(text)) {
      return Number.parseInt(text, 10);
    }
    if (/^[+-]?0x[0-9a-f]+$/i.test(text)) {
      const negative = text.startsWith('-');
      const parsed = Number.parseInt(text.replace(/^[+-]?0x/i, ''), 16);
      return negative ? -parsed : parsed;
    }
    throw new ConfigValueError(this.path, text, 'integer');
  }

  asFloat(dflt: number = 0): number {
    const text = this.value?.trim();
    if (text === undefined || text === '') {
      return dflt;
    }
    const parsed = Number(text);
    if (Number.isNaN(parsed)) {
      throw new ConfigValueError(this.path, text, 'number');
    }
    return parsed;
  }

  asBool(dflt: boolean = false): boolean {
    const text = this.value?.trim().toLowerCase();
    if (text === undefined || text === '') {
      return dflt;
    }
    if (TRUE_VALUES.has(text)) {
      return true;
    }
    if (FALSE_VALUES.has(text)) {
      return false;
    }
    throw new ConfigValueError(this.path, text, 'boolean');
  }

  asDate(dflt?: Date): Date | undefined {
    const text = this.value?.trim();
    if (text === undefined || text === '') {
      return dflt;
    }
    const parsed = new Date(text);
    if (Number.isNaN(parsed.getTime())) {
      throw new ConfigValueError(this.path, text, 'date');
    }
    return parsed;
  }

  protected checkCanModify(): void {
    if (!this.exists) {
      throw new ConfigurationError('Cannot modify a non-existent node', 'CONFIG_NODE_MISSING');
    }
    this.tree.checkCanModify();
  }
}

export class ConfigAttributeNode extends ConfigNode {
  readonly isSection = false;

  /** @internal */
  constructor(tree: ConfigTree, parent: ConfigSectionNode | null, name: string, value: string | undefined, exists: boolean) {
    super(tree, parent, name, value, exists);
  }
}

export class ConfigSectionNode extends ConfigNode {
  readonly isSection = true;
  private readonly childNodes: ConfigSectionNode[] = [];
  private readonly attributeNodes: ConfigAttributeNode[] = [];

  /** @internal */
  constructor(tree: ConfigTree, parent: ConfigSectionNode | null, name: string, value: string | undefined, exists: boolean) {
    super(tree, parent, name, value, exists);
  }

  get children(): readonly ConfigSectionNode[] {
    return [...this.childNodes];
  }

  get attributes(): readonly ConfigAttributeNode[] {
    return [...this.attributeNodes];
  }

  addChild(name: string, value?: string): ConfigSectionNode {
    this.checkCanModify();
    const node = new ConfigSectionNode(this.tree, this, name, value, true);
    this.childNodes.push(node);
    return node;
  }

  addAttribute(name: string, value?: string): ConfigAttributeNode {
    this.checkCanModify();
    const node = new ConfigAttributeNode(this.tree, this, name, value, true);
    this.attributeNodes.push(node);
    return node;
  }

  removeChild(node: ConfigSectionNode): void {
    this.checkCanModify();
    const index = this.childNodes.indexOf(node);
    if (index >= 0) {
      this.childNodes.splice(index, 1);
    }
  }

  child(name: string): ConfigSectionNode {
    return this.childNodes.find(node => node.isSameName(name)) ?? this.tree.emptySection;
  }

  attr(name: string): ConfigAttributeNode {
    return this.attributeNodes.find(node => node.isSameName(name)) ?? this.tree.emptyAttribute;
  }

  childAt(index: number): ConfigSectionNode {
    return this.childNodes[index] ?? this.tree.emptySection;
  }

  attrAt(index: number): ConfigAttributeNode {
    return this.attributeNodes[index] ?? this.tree.emptyAttribute;
  }

  /**
   * Resolves a path relative to this section.
   *
   * `/` starts at the root, `..` moves up, `$name` selects an attribute,
   * `[2]` / `$[2]` select by position, `name[value]` and `name[attr=value]`
   * select a child by value or by attribute. A leading `!` makes the target
   * required.
   */
  navigate(path: string): ConfigNode {
    let working = path.trim();
    const required = working.startsWith('!');
    if (required) {
      working = working.slice(1);
    }

    let current: ConfigNode = this;
    if (working.startsWith('/') || working.startsWith('\\')) {
      current = this.tree.root;
      working = working.slice(1);
    }

    const segments = working.replace(/\\/g, '/').split('/').filter(segment => segment !== '');
    for (const segment of segments) {
      if (!current.exists) {
        break;
      }
      current = stepInto(current, segment, path);
    }

    if (required && !current.exists) {
      throw new ConfigNodeNotFoundError(path);
    }
    return current;
  }
}

function stepInto(current: ConfigNode, rawSegment: string, path: string): ConfigNode {
  if (rawSegment === '..') {
    return current.parent;
  }
  if (!(current instanceof ConfigSectionNode)) {
    throw new ConfigurationError(`Path segment "${rawSegment}" of "${path}" does not address a section`, 'INVALID_CONFIG_PATH');
  }

  const isAttribute = rawSegment.startsWith('$');
  const segment = isAttribute ? rawSegment.slice(1).trim() : rawSegment;

  const indexMatch = /^\[(-?\d+)\]$/.exec(segment);
  if (indexMatch) {
    const index = Number.parseInt(indexMatch[1], 10);
    return isAttribute ? current.attrAt(index) : current.childAt(index);
  }

  const selectorMatch = /^([^[\]]+)\[([^\]]*)\]$/.exec(segment);
  if (selectorMatch && !isAttribute) {
    return selectChild(current, selectorMatch[1], selectorMatch[2]);
  }
  if (segment.includes('[')) {
    throw new ConfigurationError(`Invalid path segment "${rawSegment}" in "${path}"`, 'INVALID_CONFIG_PATH');
  }

  return isAttribute ? current.attr(segment) : current.child(segment);
}

function selectChild(section: ConfigSectionNode, name: string, query: string): ConfigSectionNode {
  const separator = query.indexOf('=');
  const matches = (node: ConfigSectionNode): boolean => {
    if (!node.isSameName(name)) {
      return false;
    }
    if (separator < 0) {
      return node.value !== undefined && sameName(node.value, query);
    }
    const attrValue = node.attr(query.slice(0, separator)).value;
    return attrValue !== undefined && sameName(attrValue, query.slice(separator + 1));
  };
  return section.children.find(matches) ?? section.tree.emptySection;
}
