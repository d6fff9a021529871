import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getGemfeedDir, databasePathFromUrl } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  db: z
    .object({
      path: z.string().default('~/.gemfeed/gemfeed.db'),
      busy_timeout_ms: z.number().int().nonnegative().default(5000),
    })
    .default({}),

  seed: z
    .object({
      // Empty means the bundled fixtures/seed.yaml
      file: z.string().default(''),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('gemfeed', {
    searchPlaces: ['gemfeed.config.yaml', 'gemfeed.config.yml', '.gemfeedrc.yaml', '.gemfeedrc.yml'],
  });

  const envConfigPath = process.env['GEMFEED_CONFIG'];
  const defaultConfigPath = path.join(getGemfeedDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const loaded: unknown = (await explorer.load(resolved))?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const loaded: unknown = (await explorer.load(defaultConfigPath))?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  const envDatabaseUrl = process.env['GEMFEED_DATABASE_URL'];
  if (envDatabaseUrl) {
    const dbSection = isRecord(rawConfig['db']) ? rawConfig['db'] : {};
    dbSection['path'] = databasePathFromUrl(envDatabaseUrl);
    rawConfig['db'] = dbSection;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
