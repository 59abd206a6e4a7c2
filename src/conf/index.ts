export { MAX_NESTING_DEPTH } from './constants';

export type { ISourceReader, RawSource } from './SourceReader';
export { FileSystemSourceReader } from './SourceReader';

export { VariableScope } from './VariableScope';
export type { VariableMap } from './VariableScope';

export { VariableExpander, MissingVariablePolicy } from './VariableExpander';
export type { VariableExpanderOptions } from './VariableExpander';

export { IncludeResolver, confinePath, resolveRealPath } from './IncludeResolver';
export type { IncludeResolverOptions, IncludeResult } from './IncludeResolver';

export { ConfigurationAssembler, assembleConfig } from './ConfigurationAssembler';
export type { AssembleRequest, AssemblerOptions, ConfigEntry, ResolvedConfig } from './ConfigurationAssembler';

export { ConfigTree, ConfigNode, ConfigSectionNode, ConfigAttributeNode } from './nodes';
export { JsonConfigReader } from './JsonConfigReader';
export type { IConfigReader } from './JsonConfigReader';

export {
  ConfigurationError,
  PathEscapeError,
  InvalidIncludeError,
  IncludeDepthExceededError,
  IncludeReadError,
  VariableDepthExceededError,
  UnresolvedVariableError,
  ConfigReadError,
  ConfigValueError,
  ConfigNodeNotFoundError
} from './errors';
