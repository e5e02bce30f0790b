/**
 * Engine configuration
 * Defaults < JSON file < environment < explicit overrides, validated with zod
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const MODEL_PATTERNS = ['*.glb', '*.gltf', '*.obj', '*.fbx'];
const IMAGE_PATTERNS = ['*.png', '*.jpg', '*.jpeg', '*.webp'];

export const DirectoryConfigSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  kind: z.enum(['image', 'model', 'textured-model']),
  patterns: z.array(z.string().min(1)).min(1),
  recursive: z.boolean().default(false),
});

export const ViewConfigSchema = z.object({
  name: z.string().min(1),
  directory: z.string().min(1),
  scope: z.enum(['all', 'session']),
});

export const EngineConfigSchema = z
  .object({
    rootDir: z.string().min(1).default('output'),
    statePath: z.string().min(1).default(path.join('.asset-engine', 'state.db')),
    directories: z.array(DirectoryConfigSchema).min(1).default([
      { name: 'images', path: 'images', kind: 'image', patterns: IMAGE_PATTERNS, recursive: false },
      { name: 'models', path: '3d', kind: 'model', patterns: MODEL_PATTERNS, recursive: false },
      { name: 'textured', path: path.join('3d', 'textured'), kind: 'textured-model', patterns: MODEL_PATTERNS, recursive: false },
    ]),
    views: z.array(ViewConfigSchema).default([
      { name: 'session-images', directory: 'images', scope: 'session' },
      { name: 'all-images', directory: 'images', scope: 'all' },
      { name: 'session-models', directory: 'models', scope: 'session' },
      { name: 'all-models', directory: 'models', scope: 'all' },
      { name: 'textured-models', directory: 'textured', scope: 'all' },
    ]),
    dispatcher: z.object({
      capacity: z.number().int().positive().default(256),
    }).default({}),
    watcher: z.object({
      debounceMs: z.number().int().nonnegative().default(300),
      stabilityThresholdMs: z.number().int().nonnegative().default(500),
      pollIntervalMs: z.number().int().positive().default(100),
      retry: z.object({
        initialDelayMs: z.number().int().positive().default(1000),
        maxDelayMs: z.number().int().positive().default(30000),
      }).default({}),
    }).default({}),
    scan: z.object({
      retries: z.number().int().nonnegative().default(3),
      retryDelayMs: z.number().int().nonnegative().default(250),
    }).default({}),
    associations: z.object({
      autoLinkWindowMs: z.number().int().nonnegative().default(30 * 60 * 1000),
    }).default({}),
    previews: z.object({
      totalQuota: z.number().int().positive().default(50),
      sessionQuota: z.number().int().nonnegative().default(30),
    }).default({}),
    quiet: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    if (config.previews.sessionQuota > config.previews.totalQuota) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['previews', 'sessionQuota'],
        message: 'sessionQuota cannot exceed totalQuota',
      });
    }
    const names = new Set(config.directories.map(d => d.name));
    for (const [i, view] of config.views.entries()) {
      if (!names.has(view.directory)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['views', i, 'directory'],
          message: `View "${view.name}" references unknown directory "${view.directory}"`,
        });
      }
    }
  });

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type EngineConfig = z.output<typeof EngineConfigSchema>;
export type DirectoryConfig = z.output<typeof DirectoryConfigSchema>;

export interface LoadConfigOptions {
  /** JSON config file; falls back to ASSET_ENGINE_CONFIG */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: EngineConfigInput;
}

/**
 * Resolve configuration from every source and validate it.
 * Relative directory paths are resolved against rootDir, rootDir and
 * statePath against the working directory.
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const env = options.env ?? process.env;
  const file = options.file ?? env.ASSET_ENGINE_CONFIG;

  const fromFile = file ? readConfigFile(file) : {};
  const fromEnv: Record<string, unknown> = {};
  if (env.ASSET_ENGINE_ROOT) fromEnv.rootDir = env.ASSET_ENGINE_ROOT;
  if (env.ASSET_ENGINE_STATE) fromEnv.statePath = env.ASSET_ENGINE_STATE;
  if (env.ASSET_ENGINE_QUIET !== undefined) fromEnv.quiet = env.ASSET_ENGINE_QUIET === 'true' || env.ASSET_ENGINE_QUIET === '1';

  const config = EngineConfigSchema.parse({ ...fromFile, ...fromEnv, ...options.overrides });
  return resolvePaths(config);
}

function readConfigFile(file: string): Record<string, unknown> {
  const content = fs.readFileSync(file, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Config file ${file} must contain a JSON object`);
  }
  return { ...parsed };
}

function resolvePaths(config: EngineConfig): EngineConfig {
  const rootDir = path.resolve(config.rootDir);
  return {
    ...config,
    rootDir,
    statePath: config.statePath === ':memory:' ? config.statePath : path.resolve(config.statePath),
    directories: config.directories.map(dir => ({ ...dir, path: path.resolve(rootDir, dir.path) })),
  };
}
