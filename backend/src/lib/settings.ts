import { readFile } from 'fs/promises';
import { config } from './config.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';
import { getParameterValue } from './ssm.js';
import { settingsSchema, type Settings } from './validation.js';

/**
 * Validate raw settings JSON. Any problem is a ConfigurationError naming the
 * settings source.
 */
export function parseSettings(raw: string, source: string): Settings {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Settings in ${source} are not valid JSON`);
  }

  const result = settingsSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`Invalid settings in ${source}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}

/**
 * Load settings from the SSM parameter when one is configured, otherwise from
 * the local settings file.
 */
export async function loadSettings(
  options: { paramName?: string; path?: string } = {}
): Promise<Settings> {
  const paramName = options.paramName ?? config.settings.paramName;

  if (paramName) {
    const value = await getParameterValue(paramName);
    if (value === null) {
      throw new ConfigurationError(`Settings parameter ${paramName} is empty`);
    }
    const settings = parseSettings(value, `ssm:${paramName}`);
    logger.info({ source: 'ssm', providers: settings.dataProviders.length }, 'Settings loaded');
    return settings;
  }

  const path = options.path ?? config.settings.path;
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    logger.error({ error, path }, 'Failed to read settings file');
    throw new ConfigurationError(`Settings file not readable: ${path}`);
  }

  const settings = parseSettings(raw, path);
  logger.info({ source: 'file', providers: settings.dataProviders.length }, 'Settings loaded');
  return settings;
}
