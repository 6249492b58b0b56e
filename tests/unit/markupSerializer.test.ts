import { describe, it, expect } from 'vitest';
import { parseQuirks, serializeQuirkMap, serializeQuirks } from '../../src/markup';
import { quirkListToMap } from '../../src/markup/parser';
import { createQuirk, createRule } from '../../src/quirks/factory';
import type { Quirk } from '../../src/quirks/quirk';

const DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

function buildTest(): Quirk {
  return createQuirk({
    name: 'Test',
    color: '#000000',
    aliases: ['T'],
    forwardRules: [createRule('a', 'b')],
  });
}

function buildCollection(): Quirk[] {
  return [
    createQuirk({
      name: 'Sollux',
      color: '#a1a100',
      aliases: ['TA', 'twinArmageddons'],
      forwardRules: [createRule('s', '2'), createRule('i', 'ii')],
      inverseRules: [createRule('ii', 'i'), createRule('2', 's')],
    }),
    createQuirk({
      name: 'Escapes "quoted" & <angled>',
      color: "it's",
      aliases: ['a > b', ''],
      forwardRules: [createRule('(\\w+)', '<$1>'), createRule('\\s+', ' ')],
      inverseRules: [createRule('<(\\w+)>', '$1')],
    }),
    createQuirk({ name: 'Empty', color: '' }),
  ];
}

function expectSameQuirks(actual: Quirk[], expected: Quirk[]) {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((quirk, index) => {
    expect(quirk.equals(expected[index])).toBe(true);
  });
}

describe('serializeQuirks', () => {
  it('writes a compact document on one line', () => {
    expect(serializeQuirks([buildTest()], { pretty: false })).toBe(
      `${DECLARATION}<document><rule name="Test" color="#000000"><alias value="T"/><quirk from="a" to="b"/></rule></document>`,
    );
  });

  it('indents the document by default', () => {
    expect(serializeQuirks([buildTest()])).toBe(
      [
        DECLARATION,
        '<document>',
        '  <rule name="Test" color="#000000">',
        '    <alias value="T"/>',
        '    <quirk from="a" to="b"/>',
        '  </rule>',
        '</document>',
        '',
      ].join('\n'),
    );
  });

  it('honours a custom indent width', () => {
    const quirk = createQuirk({ name: 'N', color: 'c', inverseRules: [createRule('x', 'y')] });
    expect(serializeQuirks([quirk], { indent: 4 })).toBe(
      [
        DECLARATION,
        '<document>',
        '    <rule name="N" color="c">',
        '        <dequirk from="x" to="y"/>',
        '    </rule>',
        '</document>',
        '',
      ].join('\n'),
    );
  });

  it('writes an empty root for an empty collection', () => {
    expect(serializeQuirks([])).toBe(`${DECLARATION}\n<document/>\n`);
    expect(serializeQuirks([], { pretty: false })).toBe(`${DECLARATION}<document/>`);
  });

  it('round-trips in pretty mode', () => {
    const quirks = buildCollection();
    expectSameQuirks(parseQuirks(serializeQuirks(quirks)), quirks);
  });

  it('round-trips in compact mode', () => {
    const quirks = buildCollection();
    expectSameQuirks(parseQuirks(serializeQuirks(quirks, { pretty: false })), quirks);
  });

  it('reproduces a parsed document structurally', () => {
    const first = parseQuirks(serializeQuirks(buildCollection()));
    const second = parseQuirks(serializeQuirks(first, { pretty: false }));
    expectSameQuirks(second, first);
    expect(second[1].quirkify('hi  there')).toBe('<hi> <there>');
  });

  it('rejects values XML cannot represent', () => {
    const badName = createQuirk({ name: 'bell\u0007', color: 'c' });
    expect(() => serializeQuirks([badName])).toThrow(TypeError);
    const badPattern = createQuirk({ name: 'N', color: 'c', forwardRules: [createRule('\u0001', 'x')] });
    expect(() => serializeQuirks([badPattern], { pretty: false })).toThrow(/quirk from "\\u0001"/);
  });

  it('keeps accented and astral characters', () => {
    const quirk = createQuirk({ name: 'Caf\u00e9', color: '\u{1F431}', aliases: ['\u00e9'] });
    expectSameQuirks(parseQuirks(serializeQuirks([quirk])), [quirk]);
  });

  it('rejects collections holding something other than quirks', () => {
    expect(() => Reflect.apply(serializeQuirks, undefined, [[buildTest(), { name: 'fake' }]])).toThrow(TypeError);
  });
});

describe('serializeQuirkMap', () => {
  it('writes map values in insertion order', () => {
    const quirks = buildCollection();
    const map = quirkListToMap(quirks);
    expect(serializeQuirkMap(map, { pretty: false })).toBe(serializeQuirks(quirks, { pretty: false }));
    expectSameQuirks(parseQuirks(serializeQuirkMap(map)), quirks);
  });
});
