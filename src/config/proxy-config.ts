import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { DEFAULT_FILTER_MODELS } from '../filter/filter-policy.js';
import type { ReporterConfig } from '../filter/event-reporter.js';
import { parseEnv, type EnvConfig } from './env.js';

export const DEFAULT_WORKSPACE_PATH = path.join(os.homedir(), '.context-filter');

export const ProxyConfigSchema = z.object({
  // Ollama server the proxy forwards to
  upstream: z.object({
    url: z.string().url().default('http://localhost:11434'),
    timeoutMs: z.number().int().positive().default(600000),
  }).default({}),

  proxy: z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65535).default(11435),
    enableCors: z.boolean().default(true),
    bodyLimit: z.string().default('50mb'),
  }).default({}),

  filter: z.object({
    models: z.array(z.string().min(1)).default([...DEFAULT_FILTER_MODELS]),
  }).default({}),

  logging: z.object({
    detailedLogging: z.boolean().default(true),
    showFullFilteredContent: z.boolean().default(false),
    maxPreviewLength: z.number().int().nonnegative().default(500),
    console: z.boolean().default(true),
    logsPath: z.string().default(path.join(DEFAULT_WORKSPACE_PATH, 'logs')),
  }).default({}),
});

export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;

export function defaultConfig(): ProxyConfig {
  return ProxyConfigSchema.parse({});
}

/**
 * Environment variables win over the config file.
 */
export function applyEnvOverrides(config: ProxyConfig, env: EnvConfig): ProxyConfig {
  return {
    upstream: {
      ...config.upstream,
      url: env.OLLAMA_URL ?? config.upstream.url,
    },
    proxy: {
      ...config.proxy,
      host: env.FILTER_PROXY_HOST ?? config.proxy.host,
      port: env.FILTER_PROXY_PORT ?? config.proxy.port,
    },
    filter: {
      models: env.FILTER_MODELS ?? config.filter.models,
    },
    logging: {
      ...config.logging,
      detailedLogging: env.FILTER_DETAILED_LOGGING ?? config.logging.detailedLogging,
      showFullFilteredContent: env.FILTER_SHOW_FULL_CONTENT ?? config.logging.showFullFilteredContent,
      maxPreviewLength: env.FILTER_MAX_PREVIEW_LENGTH ?? config.logging.maxPreviewLength,
      logsPath: env.FILTER_LOGS_PATH ?? config.logging.logsPath,
    },
  };
}

function freezeConfig(config: ProxyConfig): ProxyConfig {
  Object.freeze(config.upstream);
  Object.freeze(config.proxy);
  Object.freeze(config.filter.models);
  Object.freeze(config.filter);
  Object.freeze(config.logging);
  return Object.freeze(config);
}

export function reporterConfigFrom(config: ProxyConfig): ReporterConfig {
  return {
    detailedLogging: config.logging.detailedLogging,
    showFullFilteredContent: config.logging.showFullFilteredContent,
    maxPreviewLength: config.logging.maxPreviewLength,
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ProxyConfigManager {
  private configPath: string;
  private config: ProxyConfig;

  constructor(configPath?: string) {
    // Default config path: ~/.context-filter/config.json
    this.configPath = configPath || path.join(DEFAULT_WORKSPACE_PATH, 'config.json');
    this.config = freezeConfig(defaultConfig());
  }

  /**
   * Read the config file (if any), validate it and apply environment
   * overrides. The result is frozen for the lifetime of the process.
   *
   * @throws ConfigError when the file exists but is not valid JSON or does
   * not match the schema
   */
  async load(env: EnvConfig = parseEnv()): Promise<ProxyConfig> {
    let fileConfig: ProxyConfig;

    try {
      const data = await fs.readFile(this.configPath, 'utf-8');
      fileConfig = data.trim() ? this.parse(data) : defaultConfig();
      console.log(`[Config] Loaded configuration from ${this.configPath}`);
    } catch (error) {
      if (isMissingFile(error)) {
        console.log(`[Config] No configuration file found at ${this.configPath}, using defaults`);
        fileConfig = defaultConfig();
      } else if (error instanceof ConfigError) {
        throw error;
      } else {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Failed to read configuration: ${message}`, this.configPath);
      }
    }

    this.config = freezeConfig(applyEnvOverrides(fileConfig, env));
    return this.config;
  }

  private parse(data: string): ProxyConfig {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Configuration is not valid JSON: ${message}`, this.configPath);
    }

    const result = ProxyConfigSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.errors
        .map(err => `${err.path.join('.')}: ${err.message}`)
        .join('; ');
      throw new ConfigError(`Configuration validation failed: ${details}`, this.configPath);
    }
    return result.data;
  }
}

/**
 * An explicit path wins over `FILTER_CONFIG_PATH`.
 */
export async function loadConfig(configPath?: string, env: EnvConfig = parseEnv()): Promise<ProxyConfig> {
  const manager = new ProxyConfigManager(configPath ?? env.FILTER_CONFIG_PATH);
  return manager.load(env);
}
