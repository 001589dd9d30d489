/**
 * Converter configuration loader
 * Uses cosmiconfig to search for configuration in various formats
 */

import { cosmiconfig } from 'cosmiconfig';
import AjvModule from 'ajv';
import { dirname, isAbsolute, resolve } from 'path';
import {
  type ConverterConfig,
  type ConverterConfigFile,
  converterConfigSchema,
  DEFAULT_CONFIG,
} from './config-schema.js';

const Ajv = AjvModule.default;

/**
 * Module name for cosmiconfig
 */
const MODULE_NAME = 'gliffy';

/**
 * Configuration search locations (in priority order)
 */
const SEARCH_PLACES = [
  '.gliffyrc.json',
  '.gliffyrc.js',
  'gliffy.config.js',
  '.config/gliffy.json',
  'package.json',
];

/**
 * AJV validator for configuration schema
 */
const ajv = new Ajv({ allErrors: true, verbose: true });
const validateConfig = ajv.compile(converterConfigSchema);

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Loaded configuration plus where it came from
 */
export interface LoadedConfig {
  config: ConverterConfig;
  /** Config file path, or null when defaults were used */
  filepath: string | null;
}

function createExplorer() {
  // package.json is read through its "gliffy" field
  return cosmiconfig(MODULE_NAME, {
    searchPlaces: SEARCH_PLACES,
    packageProp: MODULE_NAME,
  });
}

/**
 * Paths in a config file are relative to the file's directory
 */
function resolvePaths(config: ConverterConfig, baseDir: string): ConverterConfig {
  const absolute = (path: string) => (isAbsolute(path) ? path : resolve(baseDir, path));
  return {
    ...config,
    tidMappingFile: absolute(config.tidMappingFile),
    tidImagesDir: absolute(config.tidImagesDir),
    outputDir: absolute(config.outputDir),
    reportsDir: absolute(config.reportsDir),
  };
}

/**
 * Validates configuration using AJV and merges it over the defaults
 *
 * @param config - Raw configuration from file
 * @param filepath - Path to configuration file (for errors)
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateAndNormalizeConfig(config: unknown, filepath: string): ConverterConfig {
  if (!validateConfig(config)) {
    // Collect validation errors
    const errors = (validateConfig.errors ?? []).map(err => ({
      path: err.instancePath || '(root)',
      message: err.message ?? 'Unknown error',
    }));

    throw new ConfigValidationError(`Invalid configuration in ${filepath}`, errors);
  }

  const merged: ConverterConfig = { ...DEFAULT_CONFIG };
  const file: ConverterConfigFile = config;
  if (file.tidMappingFile !== undefined) merged.tidMappingFile = file.tidMappingFile;
  if (file.tidImagesDir !== undefined) merged.tidImagesDir = file.tidImagesDir;
  if (file.outputDir !== undefined) merged.outputDir = file.outputDir;
  if (file.reportsDir !== undefined) merged.reportsDir = file.reportsDir;
  if (file.source !== undefined) merged.source = file.source;
  if (file.useTidImages !== undefined) merged.useTidImages = file.useTidImages;

  return resolvePaths(merged, dirname(filepath));
}

/**
 * Loads converter configuration from filesystem
 *
 * @param searchFrom - Directory to start search from (defaults to current)
 * @returns Found configuration or null if not found
 * @throws {ConfigValidationError} If configuration is invalid
 */
export async function loadConverterConfig(searchFrom?: string): Promise<LoadedConfig | null> {
  const result = await createExplorer().search(searchFrom);

  // If not found - return null
  if (!result || result.isEmpty) {
    return null;
  }

  return {
    config: validateAndNormalizeConfig(result.config, result.filepath),
    filepath: result.filepath,
  };
}

/**
 * Loads configuration or returns defaults resolved against `searchFrom`
 *
 * A config that fails validation is rethrown; any other loading failure
 * (unreadable file, syntax error) is logged and the defaults are used.
 */
export async function loadConverterConfigOrDefault(searchFrom?: string): Promise<LoadedConfig> {
  const baseDir = resolve(searchFrom ?? process.cwd());

  try {
    const loaded = await loadConverterConfig(baseDir);
    if (loaded) return loaded;
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      throw error;
    }
    console.error('[config-loader] Configuration loading error:', error);
  }

  return { config: resolvePaths({ ...DEFAULT_CONFIG }, baseDir), filepath: null };
}

/**
 * Formats validation errors for user output
 *
 * @param error - Validation error
 * @returns Readable error message
 */
export function formatValidationErrors(error: ConfigValidationError): string {
  const errorList = error.errors.map(err => `  - ${err.path}: ${err.message}`).join('\n');

  return `${error.message}\n\nErrors:\n${errorList}`;
}
