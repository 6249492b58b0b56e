import { DOMParser } from '@xmldom/xmldom';
import type { Document, Element } from '@xmldom/xmldom';
import { MarkupParseError, MissingFieldError } from '../common/errors';
import { getLogger } from '../common/logger';
import { createQuirk, createRule } from '../quirks/factory';
import type { Quirk } from '../quirks/quirk';
import type { Rule } from '../quirks/rule';
import { MARKUP, ParseOptions } from './types';

function readDocument(text: string): Document {
  // Every report, warnings included, means the text is not well-formed. The parser re-reports
  // errors thrown from inside its loop, so the first one is kept.
  let failure: MarkupParseError | undefined;
  const parser = new DOMParser({
    onError: (_level, message) => {
      failure = failure ?? new MarkupParseError(message);
      throw failure;
    },
  });
  try {
    return parser.parseFromString(text, 'text/xml');
  } catch (error) {
    throw failure ?? new MarkupParseError(error instanceof Error ? error.message : String(error));
  }
}

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

/** The single root element, with nothing but whitespace, comments or instructions around it. */
function parseRoot(text: string): Element {
  const doc = readDocument(text);
  const root = doc.documentElement;
  if (root === null) {
    throw new MarkupParseError('document has no root element');
  }
  for (let i = 0; i < doc.childNodes.length; i += 1) {
    const node = doc.childNodes.item(i);
    if (node === null || node === root) {
      continue;
    }
    if (node.nodeType === ELEMENT_NODE) {
      throw new MarkupParseError('document has more than one root element');
    }
    if ((node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) && (node.nodeValue ?? '').trim()) {
      throw new MarkupParseError('content outside the root element');
    }
  }
  return root;
}

/** Descendant elements with the given tag, in document order. */
function elementsByTag(scope: Element, tag: string): Element[] {
  const found: Element[] = [];
  const list = scope.getElementsByTagName(tag);
  for (let i = 0; i < list.length; i += 1) {
    const element = list.item(i);
    if (element !== null) {
      found.push(element);
    }
  }
  return found;
}

function requiredAttribute(element: Element, attribute: string): string {
  const value = element.hasAttribute(attribute) ? element.getAttribute(attribute) : null;
  if (value === null) {
    throw new MissingFieldError(element.tagName, attribute);
  }
  return value;
}

function readRules(entry: Element, tag: string): Rule[] {
  return elementsByTag(entry, tag).map((element) =>
    createRule(requiredAttribute(element, MARKUP.from), requiredAttribute(element, MARKUP.to)),
  );
}

/**
 * Parse a quirks document into quirks, one per `<rule>` element in document order.
 *
 * Entries are matched by tag at any depth. Aliases and rules are read from each entry's
 * descendants, keeping their order within each kind.
 */
export function parseQuirks(text: string, options: ParseOptions = {}): Quirk[] {
  const root = parseRoot(text);
  const logger = options.logger ?? getLogger('markup');
  const entries = elementsByTag(root, MARKUP.entry);
  if (root.tagName === MARKUP.entry) {
    entries.unshift(root);
  }

  return entries.map((entry) =>
    createQuirk(
      {
        name: requiredAttribute(entry, MARKUP.name),
        color: requiredAttribute(entry, MARKUP.color),
        aliases: elementsByTag(entry, MARKUP.alias).map((alias) => requiredAttribute(alias, MARKUP.value)),
        forwardRules: readRules(entry, MARKUP.forward),
        inverseRules: readRules(entry, MARKUP.inverse),
      },
      { verbose: options.verbose, logger },
    ),
  );
}

/** Fold quirks into a name-keyed map. A later quirk replaces an earlier one with the same name. */
export function quirkListToMap(quirks: Iterable<Quirk>): Map<string, Quirk> {
  const map = new Map<string, Quirk>();
  for (const quirk of quirks) {
    map.set(quirk.getName(), quirk);
  }
  return map;
}

export function parseQuirkMap(text: string, options: ParseOptions = {}): Map<string, Quirk> {
  return quirkListToMap(parseQuirks(text, options));
}
