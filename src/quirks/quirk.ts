import { assertInstance, assertInstanceList, assertString, assertStringList } from '../common/guards';
import { Rule } from './rule';

function applyChain(rules: readonly Rule[], text: string): string {
  assertString(text, 'text');
  return rules.reduce((current, rule) => rule.apply(current), text);
}

function sameRules(left: readonly Rule[], right: readonly Rule[]): boolean {
  return left.length === right.length && left.every((rule, index) => rule.equals(right[index]));
}

/**
 * A character's typing quirk: display metadata plus two independently authored rule chains.
 *
 * `quirkify` runs the forward chain and `dequirkify` the inverse chain. Each rule sees the
 * output of the previous one, so order matters. The inverse chain is never derived from the
 * forward one and the two are not guaranteed to undo each other.
 */
export class Quirk {
  private name = '';
  private color = '';
  private readonly aliases: string[] = [];
  private readonly forwardRules: Rule[] = [];
  private readonly inverseRules: Rule[] = [];

  setName(name: string): void {
    assertString(name, 'name');
    this.name = name;
  }

  setColor(color: string): void {
    assertString(color, 'color');
    this.color = color;
  }

  addAlias(alias: string): void {
    assertString(alias, 'alias');
    this.aliases.push(alias);
  }

  addAliases(aliases: readonly string[]): void {
    assertStringList(aliases, 'aliases');
    this.aliases.push(...aliases);
  }

  addForwardRule(rule: Rule): void {
    assertInstance(rule, Rule, 'rule');
    this.forwardRules.push(rule);
  }

  addForwardRules(rules: readonly Rule[]): void {
    assertInstanceList(rules, Rule, 'rules');
    this.forwardRules.push(...rules);
  }

  addInverseRule(rule: Rule): void {
    assertInstance(rule, Rule, 'rule');
    this.inverseRules.push(rule);
  }

  addInverseRules(rules: readonly Rule[]): void {
    assertInstanceList(rules, Rule, 'rules');
    this.inverseRules.push(...rules);
  }

  getName(): string {
    return this.name;
  }

  getColor(): string {
    return this.color;
  }

  getAliases(): readonly string[] {
    return this.aliases;
  }

  getForwardRules(): readonly Rule[] {
    return this.forwardRules;
  }

  getInverseRules(): readonly Rule[] {
    return this.inverseRules;
  }

  quirkify(text: string): string {
    return applyChain(this.forwardRules, text);
  }

  dequirkify(text: string): string {
    return applyChain(this.inverseRules, text);
  }

  describe(): string {
    const aliases = this.aliases.join(' or ');
    const forward = this.forwardRules.map((rule) => rule.toString()).join(', ');
    const inverse = this.inverseRules.map((rule) => rule.toString()).join(', ');
    return `${this.name} with color of ${this.color} as ${aliases} with ${forward} as quirkification rules and ${inverse} as dequirkification rules`;
  }

  equals(other: Quirk): boolean {
    return (
      this.name === other.name &&
      this.color === other.color &&
      this.aliases.length === other.aliases.length &&
      this.aliases.every((alias, index) => alias === other.aliases[index]) &&
      sameRules(this.forwardRules, other.forwardRules) &&
      sameRules(this.inverseRules, other.inverseRules)
    );
  }
}
