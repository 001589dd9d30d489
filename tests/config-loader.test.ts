import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ConfigValidationError,
  formatValidationErrors,
  loadConverterConfig,
  loadConverterConfigOrDefault,
  validateAndNormalizeConfig,
} from '../src/config-loader.js';
import { createTempWorkspace, type TempWorkspace } from './helpers/temp-workspace.js';

describe('validateAndNormalizeConfig', () => {
  it('should merge over defaults and resolve paths against the config file', () => {
    const config = validateAndNormalizeConfig({ outputDir: 'out', useTidImages: false }, '/project/.gliffyrc.json');

    expect(config).toEqual({
      tidMappingFile: '/project/tids_mapping.json',
      tidImagesDir: '/project/tid_images',
      outputDir: '/project/out',
      reportsDir: '/project/reports',
      source: 'https://excalidraw.com',
      useTidImages: false,
    });
  });

  it('should keep absolute paths', () => {
    expect(validateAndNormalizeConfig({ reportsDir: '/var/reports' }, '/project/.gliffyrc.json').reportsDir).toBe(
      '/var/reports'
    );
  });

  it('should reject wrong types and unknown keys', () => {
    let caught: unknown;
    try {
      validateAndNormalizeConfig({ outputDir: 3, colour: 'blue' }, '/project/.gliffyrc.json');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (!(caught instanceof ConfigValidationError)) return;
    expect(caught.message).toBe('Invalid configuration in /project/.gliffyrc.json');
    expect(caught.errors).toContainEqual({ path: '/outputDir', message: 'must be string' });
    expect(caught.errors).toContainEqual({ path: '(root)', message: 'must NOT have additional properties' });
  });

  it('should reject empty paths', () => {
    expect(() => validateAndNormalizeConfig({ outputDir: '' }, '/project/.gliffyrc.json')).toThrow(
      ConfigValidationError
    );
  });
});

describe('formatValidationErrors', () => {
  it('should list each error', () => {
    const error = new ConfigValidationError('Invalid configuration in x', [
      { path: '/outputDir', message: 'must be string' },
    ]);

    expect(formatValidationErrors(error)).toBe('Invalid configuration in x\n\nErrors:\n  - /outputDir: must be string');
  });
});

describe('loading from disk', () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    workspace = await createTempWorkspace('config-');
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await workspace.cleanup();
  });

  it('should load .gliffyrc.json', async () => {
    await workspace.writeJson('.gliffyrc.json', { outputDir: 'converted', source: 'test-source' });

    const loaded = await loadConverterConfig(workspace.root);

    expect(loaded?.filepath).toBe(workspace.path('.gliffyrc.json'));
    expect(loaded?.config.outputDir).toBe(workspace.path('converted'));
    expect(loaded?.config.source).toBe('test-source');
  });

  it('should read the "gliffy" field of package.json', async () => {
    await workspace.writeJson('package.json', { name: 'diagrams', gliffy: { useTidImages: false } });

    const loaded = await loadConverterConfig(workspace.root);

    expect(loaded?.config.useTidImages).toBe(false);
    expect(loaded?.filepath).toBe(workspace.path('package.json'));
  });

  it('should fall back to defaults resolved against the search directory', async () => {
    const loaded = await loadConverterConfigOrDefault(workspace.root);

    expect(loaded.filepath).toBeNull();
    expect(loaded.config.outputDir).toBe(workspace.path('output'));
    expect(loaded.config.tidMappingFile).toBe(workspace.path('tids_mapping.json'));
  });

  it('should use defaults when the config file cannot be parsed', async () => {
    await workspace.writeFile('.gliffyrc.json', '{ broken');

    const loaded = await loadConverterConfigOrDefault(workspace.root);

    expect(loaded.filepath).toBeNull();
    expect(console.error).toHaveBeenCalled();
  });

  it('should rethrow validation errors', async () => {
    await workspace.writeJson('.gliffyrc.json', { useTidImages: 'yes' });

    await expect(loadConverterConfigOrDefault(workspace.root)).rejects.toBeInstanceOf(ConfigValidationError);
  });
});
