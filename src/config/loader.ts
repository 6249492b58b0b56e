import { readFile } from 'node:fs/promises';
import { dirname, extname, resolve, isAbsolute } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { parse as parseToml } from 'toml';
import { QuirksConfig, QuirksConfigOverlay, QuirksConfigSchema } from './schema';

function parseContents(contents: string, absolute: string): unknown {
  switch (extname(absolute).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return loadYaml(contents);
    case '.toml':
      return parseToml(contents);
    case '.json':
      return JSON.parse(contents);
    default:
      throw new Error(`Unsupported config format for ${absolute}`);
  }
}

export async function loadConfig(path: string, profile?: string): Promise<QuirksConfig> {
  const absolute = resolve(path);
  const contents = await readFile(absolute, 'utf8');
  const result = QuirksConfigSchema.safeParse(parseContents(contents, absolute));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid config ${absolute}: ${issues.join('; ')}`);
  }

  let config = result.data;
  if (profile) {
    const overlay = config.profiles?.[profile];
    if (!overlay) {
      throw new Error(`Profile ${profile} not found in config`);
    }
    config = mergeConfigs(config, overlay);
  }

  return resolveSource(config, dirname(absolute));
}

function mergeConfigs(base: QuirksConfig, overlay: QuirksConfigOverlay): QuirksConfig {
  return {
    ...base,
    source: overlay.source ?? base.source,
    verbose: overlay.verbose ?? base.verbose,
    output: {
      ...base.output,
      ...overlay.output,
    },
    logging: {
      ...base.logging,
      ...overlay.logging,
    },
  };
}

function resolveSource(config: QuirksConfig, baseDir: string): QuirksConfig {
  if (isAbsolute(config.source)) {
    return config;
  }
  return {
    ...config,
    source: resolve(baseDir, config.source),
  };
}
