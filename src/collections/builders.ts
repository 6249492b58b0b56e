import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { getLogger } from '../common/logger';
import { parseQuirks, quirkListToMap, serializeQuirks } from '../markup';
import type { ParseOptions, SerializeOptions } from '../markup';
import type { Quirk } from '../quirks/quirk';

export function quirkListFromText(text: string, options: ParseOptions = {}): Quirk[] {
  return parseQuirks(text, options);
}

export function quirkMapFromText(text: string, options: ParseOptions = {}): Map<string, Quirk> {
  return quirkListToMap(parseQuirks(text, options));
}

export async function loadQuirkList(path: string, options: ParseOptions = {}): Promise<Quirk[]> {
  const absolute = resolve(path);
  const contents = await readFile(absolute, 'utf8');
  const quirks = parseQuirks(contents, options);
  (options.logger ?? getLogger('collections')).debug(`Loaded ${quirks.length} quirks from ${absolute}`);
  return quirks;
}

export async function loadQuirkMap(path: string, options: ParseOptions = {}): Promise<Map<string, Quirk>> {
  return quirkListToMap(await loadQuirkList(path, options));
}

export async function saveQuirks(
  path: string,
  quirks: Iterable<Quirk>,
  options: SerializeOptions = {},
): Promise<void> {
  await writeFile(resolve(path), serializeQuirks(quirks, options), 'utf8');
}

/**
 * Look a quirk up by name, falling back to the first quirk listing the key as an alias.
 */
export function findQuirk(quirks: Iterable<Quirk>, key: string): Quirk | undefined {
  const candidates = Array.from(quirks);
  return (
    candidates.find((quirk) => quirk.getName() === key) ??
    candidates.find((quirk) => quirk.getAliases().includes(key))
  );
}
