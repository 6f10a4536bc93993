import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { ValidationError } from '../errors.js';

export const ModelConfigSchema = z.object({
  provider: z.enum(['ollama', 'openai', 'anthropic']).default('ollama'),
  name: z.string().default('llama3.2'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(4096),
  baseUrl: z.string().url().optional(),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['simple', 'ollama', 'openai']).default('simple'),
  model: z.string().optional(),
  baseUrl: z.string().url().optional(),
});

export const MemoryConfigSchema = z.object({
  file: z.string().min(1).default('memory/reasoning_bank.json'),
  maxItems: z.number().int().positive().default(1000),
  evictionPolicy: z.enum(['oldest', 'failures-first']).default('oldest'),
  autoSave: z.boolean().default(true),
  retrievalTopK: z.number().int().positive().default(3),
});

export const RecommendationsConfigSchema = z.object({
  dir: z.string().min(1).default('recommendations'),
});

export const FeedbackConfigSchema = z.object({
  maxWorkers: z.number().int().positive().default(2),
  extractionTimeoutMs: z.number().int().positive().nullable().default(null),
  solubilityWarnCeiling: z.number().positive().default(1000),
});

export const ExtractorConfigSchema = z.object({
  temperature: z.number().min(0).max(2).default(1.0),
  maxTokens: z.number().int().positive().default(2048),
});

export const KnowledgeConfigSchema = z.object({
  file: z.string().min(1).nullable().default(null),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const ConfigSchema = z.object({
  version: z.number().default(1),
  model: ModelConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
  recommendations: RecommendationsConfigSchema.default({}),
  feedback: FeedbackConfigSchema.default({}),
  extractor: ExtractorConfigSchema.default({}),
  knowledge: KnowledgeConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type FeedbackConfig = z.infer<typeof FeedbackConfigSchema>;

export const FM_DIR = '.fm';
export const CONFIG_FILE = 'config.json';

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  while (currentDir !== path.dirname(currentDir)) {
    const fmPath = path.join(currentDir, FM_DIR);
    if (fs.existsSync(fmPath) && fs.statSync(fmPath).isDirectory()) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export function getFmPath(projectRoot?: string): string {
  const root = projectRoot ?? findProjectRoot();
  if (!root) {
    throw new Error('Not in a formulation-memory project. Run `fm init` first.');
  }
  return path.join(root, FM_DIR);
}

export function getConfigPath(projectRoot?: string): string {
  return path.join(getFmPath(projectRoot), CONFIG_FILE);
}

// Data paths in the config are relative to the .fm directory
export function resolveDataPath(relative: string, projectRoot?: string): string {
  return path.resolve(getFmPath(projectRoot), relative);
}

export function loadConfig(projectRoot?: string): Config {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch {
    // Unreadable config - fall back to defaults
    return defaultConfig();
  }

  const parsed = ConfigSchema.safeParse(raw);
  return parsed.success ? parsed.data : defaultConfig();
}

export function saveConfig(config: Config, projectRoot?: string): void {
  const configPath = getConfigPath(projectRoot);
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', { mode: 0o600 });
}

export function initProject(targetDir: string = process.cwd(), force: boolean = false): string {
  const fmPath = path.join(targetDir, FM_DIR);

  if (fs.existsSync(fmPath) && !force) {
    throw new Error('formulation-memory already initialized. Use --force to reinitialize.');
  }

  fs.mkdirSync(fmPath, { recursive: true, mode: 0o700 });

  const config = defaultConfig();
  fs.writeFileSync(
    path.join(fmPath, CONFIG_FILE),
    JSON.stringify(config, null, 2) + '\n',
    { mode: 0o600 }
  );

  fs.mkdirSync(path.join(fmPath, path.dirname(config.memory.file)), { recursive: true });
  fs.mkdirSync(path.join(fmPath, config.recommendations.dir, 'records'), { recursive: true });

  const gitignorePath = path.join(fmPath, '.gitignore');
  fs.writeFileSync(gitignorePath, `# formulation-memory local files
*.tmp.*
`);

  return fmPath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn a command-line string into the type the current value has.
 * "null" clears nullable keys; numeric strings fill null numbers.
 */
function coerceValue(existing: unknown, value: string): unknown {
  if (value === 'null') return null;
  if (typeof existing === 'number') return Number(value);
  if (typeof existing === 'boolean') {
    if (value !== 'true' && value !== 'false') {
      throw new ValidationError(`Expected true or false, got "${value}"`);
    }
    return value === 'true';
  }
  if (existing === null && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  return value;
}

export function setConfigValue(key: string, value: string, projectRoot?: string): Config {
  const config: Record<string, unknown> = { ...loadConfig(projectRoot) };
  const keys = key.split('.');
  const lastKey = keys.pop();
  if (!lastKey) {
    throw new ValidationError(`Invalid config key: ${key}`);
  }

  let current = config;
  for (const k of keys) {
    const next = current[k];
    if (!isRecord(next)) {
      throw new ValidationError(`Invalid config key: ${key}`);
    }
    const copy = { ...next };
    current[k] = copy;
    current = copy;
  }

  current[lastKey] = coerceValue(current[lastKey], value);

  const validated = ConfigSchema.safeParse(config);
  if (!validated.success) {
    const issues = validated.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid value for ${key}: ${issues.join('; ')}`, issues);
  }

  // Keys the schema does not know are stripped by the parse
  if (readPath(validated.data, key) === undefined) {
    throw new ValidationError(`Unknown config key: ${key}`);
  }

  saveConfig(validated.data, projectRoot);
  return validated.data;
}

function readPath(root: unknown, key: string): unknown {
  let current = root;
  for (const k of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[k];
  }
  return current;
}

export function getConfigValue(key: string, projectRoot?: string): unknown {
  return readPath(loadConfig(projectRoot), key);
}
