import type { ResolvedConfig } from './ConfigurationAssembler';
import { ConfigReadError } from './errors';
import { ConfigSectionNode, ConfigTree } from './nodes';

/**
 * Turns resolved configuration text into a node tree. Implementations own
 * the storage grammar; the pipeline only hands them resolved text.
 */
export interface IConfigReader {
  read(config: ResolvedConfig): ConfigTree;
}

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function isObject(value: unknown): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON grammar: objects become sections, scalars become attributes, arrays
 * become repeated sections named after their key (scalar elements become
 * the section value). Blank text reads as an empty root section.
 */
export class JsonConfigReader implements IConfigReader {
  constructor(private readonly rootName: string = 'config') {}

  read(config: ResolvedConfig): ConfigTree {
    const tree = new ConfigTree().create(this.rootName);

    if (config.text.trim() !== '') {
      let parsed: unknown;
      try {
        parsed = JSON.parse(config.text);
      } catch (error) {
        throw new ConfigReadError(config.source, error instanceof Error ? error.message : String(error), error);
      }
      if (!isObject(parsed)) {
        throw new ConfigReadError(config.source, 'root value must be an object');
      }
      this.fill(tree.root, parsed);
    }

    return tree.seal();
  }

  private fill(section: ConfigSectionNode, object: { [key: string]: JsonValue }): void {
    for (const [key, value] of Object.entries(object)) {
      if (Array.isArray(value)) {
        for (const item of value) {
          this.addSection(section, key, item);
        }
      } else if (isObject(value)) {
        this.addSection(section, key, value);
      } else {
        section.addAttribute(key, value === null ? undefined : String(value));
      }
    }
  }

  private addSection(parent: ConfigSectionNode, name: string, value: JsonValue): void {
    if (isObject(value)) {
      this.fill(parent.addChild(name), value);
    } else if (Array.isArray(value)) {
      const child = parent.addChild(name);
      for (const item of value) {
        this.addSection(child, name, item);
      }
    } else {
      parent.addChild(name, value === null ? undefined : String(value));
    }
  }
}
