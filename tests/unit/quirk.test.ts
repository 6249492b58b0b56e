import { describe, it, expect } from 'vitest';
import { Quirk } from '../../src/quirks/quirk';
import { Rule } from '../../src/quirks/rule';

function buildSollux(): Quirk {
  const quirk = new Quirk();
  quirk.setName('Sollux');
  quirk.setColor('#a1a100');
  quirk.addAliases(['TA', 'twinArmageddons']);
  quirk.addForwardRules([new Rule('s', '2'), new Rule('i', 'ii')]);
  quirk.addInverseRule(new Rule('ii', 'i'));
  return quirk;
}

describe('Quirk', () => {
  it('returns text unchanged when a chain is empty', () => {
    const quirk = new Quirk();
    for (const text of ['', 'yes sir', '  $1 \\n ']) {
      expect(quirk.quirkify(text)).toBe(text);
      expect(quirk.dequirkify(text)).toBe(text);
    }
  });

  it('replaces every occurrence with a single rule', () => {
    const quirk = new Quirk();
    quirk.addForwardRule(new Rule('s', '2'));
    expect(quirk.quirkify('yes sir')).toBe('ye2 2ir');
  });

  it('applies the forward rules in order', () => {
    expect(buildSollux().quirkify('yes sir')).toBe('ye2 2iir');
  });

  it('feeds each rule the output of the previous one', () => {
    const aToB = new Rule('a', 'b');
    const bToC = new Rule('b', 'c');

    const first = new Quirk();
    first.addForwardRules([aToB, bToC]);
    const second = new Quirk();
    second.addForwardRules([bToC, aToB]);

    expect(first.quirkify('ab')).toBe('cc');
    expect(second.quirkify('ab')).toBe('bc');
  });

  it('uses the inverse chain independently of the forward chain', () => {
    const quirk = buildSollux();
    expect(quirk.dequirkify('thiis')).toBe('this');
    expect(quirk.dequirkify('ye2')).toBe('ye2');
  });

  it('appends aliases after existing ones', () => {
    const quirk = new Quirk();
    quirk.addAlias('first');
    quirk.addAliases(['second', 'third']);
    expect(quirk.getAliases()).toEqual(['first', 'second', 'third']);
  });

  it('leaves aliases untouched when a list holds a non-string', () => {
    const quirk = new Quirk();
    quirk.addAlias('first');
    expect(() => Reflect.apply(quirk.addAliases, quirk, [['ok', 5]])).toThrow(TypeError);
    expect(quirk.getAliases()).toEqual(['first']);
  });

  it('leaves rules untouched when a list holds a non-rule', () => {
    const quirk = buildSollux();
    expect(() => Reflect.apply(quirk.addForwardRules, quirk, [[new Rule('a', 'b'), 'c']])).toThrow(TypeError);
    expect(() => Reflect.apply(quirk.addInverseRule, quirk, [{ pattern: 'a' }])).toThrow(TypeError);
    expect(quirk.getForwardRules()).toHaveLength(2);
    expect(quirk.getInverseRules()).toHaveLength(1);
  });

  it('rejects non-string names, colors and input text', () => {
    const quirk = buildSollux();
    expect(() => Reflect.apply(quirk.setName, quirk, [42])).toThrow(TypeError);
    expect(() => Reflect.apply(quirk.setColor, quirk, [undefined])).toThrow(TypeError);
    expect(() => Reflect.apply(quirk.quirkify, quirk, [7])).toThrow(TypeError);
    expect(() => Reflect.apply(quirk.dequirkify, quirk, [['text']])).toThrow(TypeError);
    expect(quirk.getName()).toBe('Sollux');
    expect(quirk.getColor()).toBe('#a1a100');
  });

  it('keeps per-instance state', () => {
    const first = new Quirk();
    first.addAlias('only-mine');
    expect(new Quirk().getAliases()).toEqual([]);
  });

  it('describes itself on one line', () => {
    expect(buildSollux().describe()).toBe(
      'Sollux with color of #a1a100 as TA or twinArmageddons with s to 2, i to ii as quirkification rules and ii to i as dequirkification rules',
    );
  });

  it('compares structurally', () => {
    expect(buildSollux().equals(buildSollux())).toBe(true);
    const other = buildSollux();
    other.addAlias('extra');
    expect(buildSollux().equals(other)).toBe(false);
  });
});
