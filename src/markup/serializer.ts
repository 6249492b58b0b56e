import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import type { Document, Element } from '@xmldom/xmldom';
import { assertInstanceList } from '../common/guards';
import { Quirk } from '../quirks/quirk';
import type { Rule } from '../quirks/rule';
import { MARKUP, SerializeOptions, XML_DECLARATION } from './types';

// Characters outside the XML 1.0 `Char` production.
const NON_XML_CHARACTER = /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/u;

/**
 * Appends elements to the tree, inserting indentation text nodes when an indent unit is set.
 */
class TreeWriter {
  constructor(
    private readonly doc: Document,
    private readonly unit?: string,
  ) {}

  append(parent: Element, tag: string, attributes: Record<string, string>, depth: number): Element {
    const element = this.doc.createElement(tag);
    for (const [key, value] of Object.entries(attributes)) {
      if (NON_XML_CHARACTER.test(value)) {
        throw new TypeError(`${tag} ${key} ${JSON.stringify(value)} holds a character XML cannot represent.`);
      }
      element.setAttribute(key, value);
    }
    if (this.unit !== undefined) {
      parent.appendChild(this.doc.createTextNode(`\n${this.unit.repeat(depth)}`));
    }
    parent.appendChild(element);
    return element;
  }

  close(element: Element, depth: number): void {
    if (this.unit !== undefined && element.hasChildNodes()) {
      element.appendChild(this.doc.createTextNode(`\n${this.unit.repeat(depth)}`));
    }
  }
}

function writeRules(writer: TreeWriter, entry: Element, tag: string, rules: readonly Rule[]): void {
  for (const rule of rules) {
    writer.append(entry, tag, { [MARKUP.from]: rule.getPattern(), [MARKUP.to]: rule.getReplacement() }, 2);
  }
}

export function serializeQuirks(quirks: Iterable<Quirk>, options: SerializeOptions = {}): string {
  const items = Array.from(quirks);
  assertInstanceList(items, Quirk, 'quirks');

  const pretty = options.pretty ?? true;
  const doc = new DOMParser().parseFromString(`<${MARKUP.root}/>`, 'text/xml');
  const root = doc.documentElement;
  if (root === null) {
    throw new Error(`Could not create the <${MARKUP.root}> element`);
  }
  const writer = new TreeWriter(doc, pretty ? ' '.repeat(options.indent ?? 2) : undefined);

  for (const quirk of items) {
    const entry = writer.append(
      root,
      MARKUP.entry,
      { [MARKUP.name]: quirk.getName(), [MARKUP.color]: quirk.getColor() },
      1,
    );
    for (const alias of quirk.getAliases()) {
      writer.append(entry, MARKUP.alias, { [MARKUP.value]: alias }, 2);
    }
    writeRules(writer, entry, MARKUP.forward, quirk.getForwardRules());
    writeRules(writer, entry, MARKUP.inverse, quirk.getInverseRules());
    writer.close(entry, 1);
  }
  writer.close(root, 0);

  const body = new XMLSerializer().serializeToString(doc);
  return pretty ? `${XML_DECLARATION}\n${body}\n` : `${XML_DECLARATION}${body}`;
}

export function serializeQuirkMap(quirks: ReadonlyMap<string, Quirk>, options: SerializeOptions = {}): string {
  return serializeQuirks(quirks.values(), options);
}
