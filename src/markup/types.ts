import type { BuildOptions } from '../quirks/factory';

/** Element and attribute names of the quirks document. */
export const MARKUP = {
  root: 'document',
  entry: 'rule',
  alias: 'alias',
  forward: 'quirk',
  inverse: 'dequirk',
  name: 'name',
  color: 'color',
  value: 'value',
  from: 'from',
  to: 'to',
} as const;

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export type ParseOptions = BuildOptions;

export interface SerializeOptions {
  /** Indent nested elements and end with a newline. Defaults to true. */
  pretty?: boolean;
  /** Spaces per nesting level in pretty mode. Defaults to 2. */
  indent?: number;
}
