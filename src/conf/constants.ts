/** Nesting bound shared by include resolution and variable expansion. */
export const MAX_NESTING_DEPTH = 10;

export const INCLUDE_PATTERN = /#include<([^<>]*)>/g;

export const VARIABLE_START = '$(';
export const VARIABLE_END = ')';
export const VARIABLE_ESCAPE = '$$(';
export const ENV_PREFIX = '~';
export const REQUIRED_ENV_PREFIX = '~!';
