import fs from 'node:fs';
import path from 'node:path';
import ini from 'ini';
import { z } from 'zod';
import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const DEFAULT_CONFIG_FILE = 'config/config.ini';

// Keys that sit above the first [section] header
export const DEFAULT_SECTION = 'DEFAULT';

export type ConfigSections = Record<string, Record<string, string>>;

const BOOLEAN_STATES = new Map<string, boolean>([
  ['1', true],
  ['yes', true],
  ['true', true],
  ['on', true],
  ['0', false],
  ['no', false],
  ['false', false],
  ['off', false],
]);

function parseBoolean(value: string): boolean | undefined {
  return BOOLEAN_STATES.get(value.trim().toLowerCase());
}

const booleanFlag = z.string().transform((value, ctx) => {
  const state = parseBoolean(value);
  if (state === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a boolean: ${value}` });
    return z.NEVER;
  }
  return state;
});

// Configuration schema validation
const SettingsSchema = z.object({
  database: z.object({
    host: z.string().default('localhost'),
    port: z.coerce.number().int().positive().default(5432),
    name: z.string().default('app'),
    user: z.string().default('app'),
    password: z.string().default(''),
  }),
  api: z.object({
    baseUrl: z.string().url().default('http://localhost:8000'),
    timeout: z.coerce.number().positive().default(30), // seconds
    maxRetries: z.coerce.number().int().nonnegative().default(3),
  }),
  cache: z.object({
    enabled: booleanFlag.default('true'),
    ttl: z.coerce.number().positive().default(300), // 5 minutes
    maxSize: z.coerce.number().int().positive().default(1000),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    directory: z.string().min(1).default('logs'),
    rotation: z.enum(['daily', 'hourly']).default('daily'),
    backupCount: z.coerce.number().int().nonnegative().default(7),
  }),
});

export type Settings = z.infer<typeof SettingsSchema>;
export type LogLevel = Settings['logging']['level'];
export type Rotation = Settings['logging']['rotation'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toStringValue(value: unknown): string | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  // ini yields arrays for `key[]=` entries; keep the last one like a plain key would
  if (Array.isArray(value) && value.length > 0) {
    return toStringValue(value[value.length - 1]);
  }
  return undefined;
}

/**
 * Flatten what `ini.parse` returns into section -> key -> string.
 * Dotted headers such as `[a.b]` come back nested, so they are walked back into dotted names.
 */
export function parseConfigText(text: string): ConfigSections {
  const parsed: Record<string, unknown> = ini.parse(text);
  const sections: ConfigSections = {};
  const headers = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const match = /^\s*\[([^\]]*)\]\s*$/.exec(line);
    if (match) {
      headers.add(match[1].trim().replace(/\\\./g, '.'));
    }
  }

  const collect = (name: string, entries: Record<string, unknown>): void => {
    const values: Record<string, string> = {};
    for (const [key, raw] of Object.entries(entries)) {
      if (isRecord(raw)) {
        collect(`${name}.${key}`, raw);
        continue;
      }
      const value = toStringValue(raw);
      if (value !== undefined) {
        values[key] = value;
      }
    }
    // `[a.b]` alone implies an `a` table in the parse; only a written `[a]` makes it a section
    if (Object.keys(values).length > 0 || Object.keys(entries).length === 0 || headers.has(name)) {
      sections[name] = { ...sections[name], ...values };
    }
  };

  const topLevel: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(parsed)) {
    if (isRecord(raw)) {
      collect(key, raw);
    } else {
      topLevel[key] = raw;
    }
  }
  if (Object.keys(topLevel).length > 0) {
    collect(DEFAULT_SECTION, topLevel);
  }

  return sections;
}

export function resolveConfigPath(filePath?: string): string {
  return path.resolve(filePath || process.env.APP_CONFIG_FILE || DEFAULT_CONFIG_FILE);
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private readonly filePath: string;
  private sectionsData: ConfigSections;
  private config: Settings;

  constructor(filePath?: string) {
    this.filePath = resolveConfigPath(filePath);
    this.sectionsData = this.readFile();
    this.config = this.loadSettings();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Drop the process-wide instance so the next getInstance() re-reads the environment.
   */
  public static resetInstance(): void {
    ConfigManager.instance = undefined;
  }

  private readFile(): ConfigSections {
    if (!fs.existsSync(this.filePath)) {
      throw new Error(`Configuration file not found: ${this.filePath}`);
    }
    return parseConfigText(fs.readFileSync(this.filePath, 'utf-8'));
  }

  private loadSettings(): Settings {
    const rawConfig = {
      database: {
        host: this.get('database', 'host'),
        port: this.get('database', 'port'),
        name: this.get('database', 'name'),
        user: this.get('database', 'user'),
        password: this.get('database', 'password'),
      },
      api: {
        baseUrl: this.get('api', 'base_url'),
        timeout: this.get('api', 'timeout'),
        maxRetries: this.get('api', 'max_retries'),
      },
      cache: {
        enabled: this.get('cache', 'enabled'),
        ttl: this.get('cache', 'ttl'),
        maxSize: this.get('cache', 'max_size'),
      },
      logging: {
        level: process.env.LOG_LEVEL || this.get('logging', 'level'),
        directory: process.env.LOG_DIR || this.get('logging', 'directory'),
        rotation: this.get('logging', 'rotation'),
        backupCount: this.get('logging', 'backup_count'),
      },
    };

    try {
      return SettingsSchema.parse(rawConfig);
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issues = error.issues.map(issue =>
          `${issue.path.join('.')}: ${issue.message}`
        ).join('\n');
        throw new Error(`Configuration validation failed:\n${issues}`);
      }
      throw error;
    }
  }

  public get path(): string {
    return this.filePath;
  }

  /**
   * Literal value from the file, or the fallback when the section or key is absent
   */
  public get(section: string, key: string): string | undefined;
  public get(section: string, key: string, fallback: string): string;
  public get(section: string, key: string, fallback?: string): string | undefined {
    const entries = this.sectionsData[section];
    if (entries && key in entries) {
      return entries[key];
    }
    return fallback;
  }

  public getNumber(section: string, key: string, fallback: number): number {
    const raw = this.get(section, key);
    if (raw === undefined) {
      return fallback;
    }
    const value = Number(raw);
    if (raw.trim() === '' || Number.isNaN(value)) {
      throw new Error(`Invalid number for [${section}] ${key}: ${raw}`);
    }
    return value;
  }

  public getBoolean(section: string, key: string, fallback: boolean): boolean {
    const raw = this.get(section, key);
    if (raw === undefined) {
      return fallback;
    }
    const value = parseBoolean(raw);
    if (value === undefined) {
      throw new Error(`Invalid boolean for [${section}] ${key}: ${raw}`);
    }
    return value;
  }

  public has(section: string, key: string): boolean {
    return this.get(section, key) !== undefined;
  }

  public sections(): string[] {
    return Object.keys(this.sectionsData);
  }

  public keys(section: string): string[] {
    return Object.keys(this.sectionsData[section] ?? {});
  }

  public reload(): void {
    this.sectionsData = this.readFile();
    this.config = this.loadSettings();
  }

  public get settings(): Settings {
    return this.config;
  }

  // Getter methods for convenience
  public get database() {
    return this.config.database;
  }

  public get api() {
    return this.config.api;
  }

  public get cache() {
    return this.config.cache;
  }

  public get logging() {
    return this.config.logging;
  }
}

export default ConfigManager;
