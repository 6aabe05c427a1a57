import { z } from 'zod';
import merge from 'lodash/merge.js';
import { loadDefaultsYaml, loadConfigYaml, getDefaultsPath, getConfigPath } from './config-file.js';

// ============================================
// Schemas (validation only, defaults live in config.defaults.yaml)
// ============================================

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

const logConfigSchema = z.object({
  level: logLevelSchema,
  target: z.enum(['stdout', 'file']),
  filePath: z.string(),
});

const bwConfigSchema = z.object({
  executable: z.string().min(1, 'bw.executable must not be empty'),
  timeoutSeconds: z.number().positive(),
});

const promptConfigSchema = z.object({
  program: z.string().min(1, 'prompt.program must not be empty'),
  description: z.string(),
  prompt: z.string(),
  timeoutSeconds: z.number().positive(),
});

const sessionConfigSchema = z.object({
  username: z.string(),
});

const configSchema = z.object({
  bw: bwConfigSchema,
  prompt: promptConfigSchema,
  session: sessionConfigSchema,
  log: logConfigSchema,
});

export type AppConfig = z.infer<typeof configSchema>;
export type LogConfig = z.infer<typeof logConfigSchema>;
export type BwConfig = z.infer<typeof bwConfigSchema>;
export type PromptConfig = z.infer<typeof promptConfigSchema>;
export type SessionConfig = z.infer<typeof sessionConfigSchema>;

// ============================================
// Loading
// ============================================

export interface ConfigPaths {
  defaultsPath?: string;
  configPath?: string;
}

export function loadConfig(paths: ConfigPaths = {}): AppConfig {
  const defaults = loadDefaultsYaml(paths.defaultsPath ?? getDefaultsPath());
  const user = loadConfigYaml(paths.configPath ?? getConfigPath());

  try {
    return configSchema.parse(merge({}, defaults, user));
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      error.issues.forEach((e) => console.error(`  - ${e.path.join('.')}: ${e.message}`));
      throw new Error('Invalid configuration. Please check config.yaml and config.defaults.yaml');
    }
    throw error;
  }
}

// ============================================
// State
// ============================================

let config: AppConfig | null = null;

export function initConfig(paths: ConfigPaths = {}): AppConfig {
  config = loadConfig(paths);
  return config;
}

function getConfig(): AppConfig {
  if (!config) throw new Error('Config not initialized. Call initConfig() first.');
  return config;
}

export const getLogConfig = () => getConfig().log;
export const getBwConfig = () => getConfig().bw;
export const getPromptConfig = () => getConfig().prompt;
export const getSessionConfig = () => getConfig().session;
