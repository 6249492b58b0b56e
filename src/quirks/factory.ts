import { getLogger, Logger } from '../common/logger';
import { assertString } from '../common/guards';
import { Quirk } from './quirk';
import { Rule } from './rule';

export interface QuirkDefinition {
  name: string;
  color: string;
  aliases?: readonly string[];
  forwardRules?: readonly Rule[];
  inverseRules?: readonly Rule[];
}

export interface BuildOptions {
  /** Log a summary of every quirk as it is built. */
  verbose?: boolean;
  logger?: Logger;
}

export function createRule(pattern: string, replacement: string): Rule {
  assertString(pattern, 'the pattern to look for');
  assertString(replacement, 'the replacement');
  return new Rule(pattern, replacement);
}

export function createQuirk(definition: QuirkDefinition, options: BuildOptions = {}): Quirk {
  const quirk = new Quirk();
  quirk.setName(definition.name);
  quirk.setColor(definition.color);
  quirk.addAliases(definition.aliases ?? []);
  quirk.addForwardRules(definition.forwardRules ?? []);
  quirk.addInverseRules(definition.inverseRules ?? []);

  if (options.verbose) {
    const log = options.logger ?? getLogger('quirks');
    log.info(`Creating ${quirk.describe()}`);
  }
  return quirk;
}
