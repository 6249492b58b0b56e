#!/usr/bin/env node
import { Command } from 'commander';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { dirname, relative, resolve } from 'node:path';
import { loadQuirkList, findQuirk, saveQuirks } from '../collections';
import { configureLogger, getLogger, Logger, parseLogFormat, parseLogLevel } from '../common/logger';
import { loadConfig, QuirksConfig } from '../config';
import { serializeQuirks } from '../markup';
import type { Quirk } from '../quirks';

const DEFAULT_CONFIG = '.typing-quirks.yaml';
const ENV_LOG_LEVEL = 'TYPING_QUIRKS_LOG_LEVEL';
const ENV_LOG_FORMAT = 'TYPING_QUIRKS_LOG_FORMAT';

type GlobalOptions = {
  logLevel?: string;
  logFormat?: string;
};

type SourceOptions = GlobalOptions & {
  config?: string;
  profile?: string;
  file?: string;
  verbose?: boolean;
};

type TransformOptions = SourceOptions & {
  quirk: string;
};

type FormatOptions = SourceOptions & {
  compact?: boolean;
  indent?: string;
  output?: string;
};

type InitOptions = GlobalOptions & {
  config: string;
  quirks: string;
};

interface Session {
  path: string;
  quirks: Quirk[];
  config?: QuirksConfig;
}

function buildSampleConfig(source: string): string {
  return `source: ${JSON.stringify(source)}
verbose: false
output:
  pretty: true
  indent: 2
logging:
  level: info
  format: text
profiles:
  ci:
    output:
      pretty: false
    logging:
      format: json
`;
}

function buildSampleQuirks(): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<document>
  <rule name="Sollux" color="#a1a100">
    <alias value="TA"/>
    <alias value="twinArmageddons"/>
    <quirk from="s" to="2"/>
    <quirk from="i" to="ii"/>
    <dequirk from="ii" to="i"/>
    <dequirk from="2" to="s"/>
  </rule>
  <rule name="Nepeta" color="#416600">
    <alias value="AC"/>
    <quirk from="per" to="purr"/>
    <quirk from="^" to=":33 &lt; "/>
    <dequirk from="^:33 &lt; " to=""/>
    <dequirk from="purr" to="per"/>
  </rule>
</document>
`;
}

function configureLogging(options: GlobalOptions, config?: QuirksConfig): void {
  configureLogger({
    level: parseLogLevel(options.logLevel) ?? config?.logging?.level,
    format: parseLogFormat(options.logFormat) ?? config?.logging?.format,
  });
}

async function fileExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  );
}

async function openSession(options: SourceOptions, log: Logger): Promise<Session> {
  let config: QuirksConfig | undefined;
  const configPath = options.config ?? DEFAULT_CONFIG;
  if (options.config || !options.file || (await fileExists(resolve(configPath)))) {
    config = await loadConfig(configPath, options.profile);
    configureLogging(options, config);
  }

  const path = options.file ? resolve(options.file) : config?.source;
  if (!path) {
    throw new Error('No quirks document given; pass --file or --config');
  }
  const quirks = await loadQuirkList(path, { verbose: options.verbose ?? config?.verbose, logger: log });
  log.debug(`Loaded ${quirks.length} quirks`, { path });
  return { path, quirks, config };
}

function requireQuirk(session: Session, key: string): Quirk {
  const quirk = findQuirk(session.quirks, key);
  if (!quirk) {
    throw new Error(`Quirk "${key}" not found in ${session.path}`);
  }
  return quirk;
}

function parseIndent(value?: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 0) {
    throw new Error(`Unsupported indent "${value}". Expected a non-negative integer.`);
  }
  return indent;
}

async function guard(log: Logger, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    log.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

function withSourceOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--file <path>', 'Quirks document (overrides the configured source)')
    .option('--verbose', 'Log a summary of every quirk while loading');
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();
  program.name('typing-quirks').description('Apply typing quirks to text');

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env[ENV_LOG_LEVEL])
    .option('--log-format <format>', 'Log format (text|json)', process.env[ENV_LOG_FORMAT])
    .hook('preAction', (_program, actionCommand) => {
      try {
        configureLogging(actionCommand.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  program
    .command('init')
    .description('Create a sample config and quirks document')
    .option('--config <path>', 'Config path', DEFAULT_CONFIG)
    .option('--quirks <path>', 'Quirks document path', 'quirks.xml')
    .action(async (_options: InitOptions, command: Command) => {
      const log = getLogger('cli:init');
      await guard(log, async () => {
        const options = command.optsWithGlobals<InitOptions>();
        const configPath = resolve(options.config);
        const quirksPath = resolve(options.quirks);
        for (const target of [configPath, quirksPath]) {
          if (await fileExists(target)) {
            throw new Error(`Refusing to overwrite ${target}`);
          }
        }
        await mkdir(dirname(configPath), { recursive: true });
        await mkdir(dirname(quirksPath), { recursive: true });
        // The config resolves its source against its own directory.
        const source = relative(dirname(configPath), quirksPath);
        await writeFile(configPath, buildSampleConfig(source), { flag: 'wx' });
        await writeFile(quirksPath, buildSampleQuirks(), { flag: 'wx' });
        log.info(`Created config at ${configPath} and quirks at ${quirksPath}`);
      });
    });

  withSourceOptions(program.command('list').description('List the quirks of a document')).action(
    async (_options: SourceOptions, command: Command) => {
      const log = getLogger('cli:list');
      await guard(log, async () => {
        const session = await openSession(command.optsWithGlobals<SourceOptions>(), log);
        for (const quirk of session.quirks) {
          const aliases = quirk.getAliases().join(', ') || '-';
          process.stdout.write(
            `${quirk.getName()}\t${quirk.getColor()}\t${aliases}\t${quirk.getForwardRules().length}/${quirk.getInverseRules().length}\n`,
          );
        }
      });
    },
  );

  for (const direction of ['quirkify', 'dequirkify'] as const) {
    withSourceOptions(
      program
        .command(`${direction} <text...>`)
        .description(direction === 'quirkify' ? 'Apply a quirk to plain text' : 'Strip a quirk from quirked text')
        .requiredOption('--quirk <nameOrAlias>', 'Quirk name or alias'),
    ).action(async (words: string[], _options: TransformOptions, command: Command) => {
      const log = getLogger(`cli:${direction}`);
      await guard(log, async () => {
        const options = command.optsWithGlobals<TransformOptions>();
        const session = await openSession(options, log);
        const quirk = requireQuirk(session, options.quirk);
        const text = words.join(' ');
        const result = direction === 'quirkify' ? quirk.quirkify(text) : quirk.dequirkify(text);
        process.stdout.write(`${result}\n`);
      });
    });
  }

  withSourceOptions(program.command('format').description('Rewrite a quirks document'))
    .option('--compact', 'Emit the document on a single line')
    .option('--indent <spaces>', 'Spaces per nesting level in pretty mode')
    .option('--output <path>', 'Write to a file instead of stdout')
    .action(async (_options: FormatOptions, command: Command) => {
      const log = getLogger('cli:format');
      await guard(log, async () => {
        const options = command.optsWithGlobals<FormatOptions>();
        const session = await openSession(options, log);
        const serializeOptions = {
          pretty: options.compact ? false : session.config?.output?.pretty ?? true,
          indent: parseIndent(options.indent) ?? session.config?.output?.indent,
        };
        if (options.output) {
          const target = resolve(options.output);
          await saveQuirks(target, session.quirks, serializeOptions);
          log.info(`Wrote ${session.quirks.length} quirks to ${target}`);
          return;
        }
        process.stdout.write(serializeQuirks(session.quirks, serializeOptions));
      });
    });

  await program.parseAsync(argv);
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
