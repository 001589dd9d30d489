/**
 * Converter configuration schemas
 * Defines TypeScript interfaces and JSON Schema for validation
 */

import type { JSONSchemaType } from 'ajv';

/**
 * Resolved converter configuration
 */
export interface ConverterConfig {
  /** TID → image mapping file (JSON) */
  tidMappingFile: string;

  /** Directory that relative image paths in the mapping resolve against */
  tidImagesDir: string;

  /** Where converted .excalidraw files are written */
  outputDir: string;

  /** Where text reports are written */
  reportsDir: string;

  /** Value of the `source` field of produced documents */
  source: string;

  /** Substitute mapped stencils with their images */
  useTidImages: boolean;
}

/**
 * Configuration as written in a file: every field optional
 */
export type ConverterConfigFile = Partial<ConverterConfig>;

/**
 * JSON Schema for configuration validation using AJV
 */
export const converterConfigSchema: JSONSchemaType<ConverterConfigFile> = {
  type: 'object',
  properties: {
    tidMappingFile: { type: 'string', nullable: true, minLength: 1 },
    tidImagesDir: { type: 'string', nullable: true, minLength: 1 },
    outputDir: { type: 'string', nullable: true, minLength: 1 },
    reportsDir: { type: 'string', nullable: true, minLength: 1 },
    source: { type: 'string', nullable: true },
    useTidImages: { type: 'boolean', nullable: true },
  },
  additionalProperties: false,
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ConverterConfig = {
  tidMappingFile: 'tids_mapping.json',
  tidImagesDir: 'tid_images',
  outputDir: 'output',
  reportsDir: 'reports',
  source: 'https://excalidraw.com',
  useTidImages: true,
};
