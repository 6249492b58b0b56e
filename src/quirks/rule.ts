import { assertString } from '../common/guards';

/**
 * One search/replace step of a quirk chain.
 *
 * The pattern is compiled with the `g` flag on first use, so a malformed pattern only
 * surfaces (as a `SyntaxError`) when the rule is applied. Replacements follow the
 * `String.prototype.replace` template syntax: `$1`, `$<name>`, `$&` and `$$`.
 */
export class Rule {
  private pattern = '';
  private replacement = '';
  private compiled?: RegExp;

  constructor(pattern = '', replacement = '') {
    this.setPattern(pattern);
    this.setReplacement(replacement);
  }

  setPattern(pattern: string): void {
    assertString(pattern, 'pattern');
    this.pattern = pattern;
    this.compiled = undefined;
  }

  setReplacement(replacement: string): void {
    assertString(replacement, 'replacement');
    this.replacement = replacement;
  }

  getPattern(): string {
    return this.pattern;
  }

  getReplacement(): string {
    return this.replacement;
  }

  apply(text: string): string {
    assertString(text, 'text');
    if (!this.compiled) {
      this.compiled = new RegExp(this.pattern, 'g');
    }
    return text.replace(this.compiled, this.replacement);
  }

  equals(other: Rule): boolean {
    return this.pattern === other.pattern && this.replacement === other.replacement;
  }

  toString(): string {
    return `${this.pattern} to ${this.replacement}`;
  }
}
