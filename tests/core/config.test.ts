import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigManager, parseConfigText } from '../../src/core/config.js';

const SAMPLE_INI = `top = level

[database]
host = db.internal
port = 6543
password =

[api]
base_url = https://api.example.test
timeout = 12.5

[cache]
enabled = off
ttl = 60

[logging]
level = debug
rotation = hourly
backup_count = 0
`;

describe('ConfigManager', () => {
  let dir: string;
  let configPath: string;

  const writeConfig = (text: string, name = 'config.ini'): string => {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, text);
    return filePath;
  };

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_DIR;
    delete process.env.APP_CONFIG_FILE;
    ConfigManager.resetInstance();

    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
    configPath = writeConfig(SAMPLE_INI);
  });

  afterEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_DIR;
    delete process.env.APP_CONFIG_FILE;
    ConfigManager.resetInstance();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('raw key access', () => {
    it('should return the literal value present in the file', () => {
      const config = new ConfigManager(configPath);

      expect(config.get('database', 'host')).toBe('db.internal');
      expect(config.get('database', 'port')).toBe('6543');
      expect(config.get('api', 'base_url')).toBe('https://api.example.test');
      expect(config.get('database', 'password')).toBe('');
    });

    it('should return the default for an absent key or section', () => {
      const config = new ConfigManager(configPath);

      expect(config.get('database', 'schema', 'public')).toBe('public');
      expect(config.get('queue', 'url', 'memory://')).toBe('memory://');
      expect(config.get('database', 'schema')).toBeUndefined();
    });

    it('should keep keys above the first section under DEFAULT', () => {
      const config = new ConfigManager(configPath);

      expect(config.get('DEFAULT', 'top')).toBe('level');
      expect(config.sections()).toEqual(['database', 'api', 'cache', 'logging', 'DEFAULT']);
      expect(config.keys('cache')).toEqual(['enabled', 'ttl']);
      expect(config.keys('queue')).toEqual([]);
    });

    it('should report whether a key exists', () => {
      const config = new ConfigManager(configPath);

      expect(config.has('database', 'password')).toBe(true);
      expect(config.has('database', 'schema')).toBe(false);
    });

    it('should parse numbers and booleans with defaults', () => {
      const config = new ConfigManager(configPath);

      expect(config.getNumber('api', 'timeout', 30)).toBe(12.5);
      expect(config.getNumber('api', 'max_retries', 3)).toBe(3);
      expect(config.getBoolean('cache', 'enabled', true)).toBe(false);
      expect(config.getBoolean('cache', 'compress', true)).toBe(true);
    });

    it('should reject values that are not numbers or booleans', () => {
      const config = new ConfigManager(configPath);

      expect(() => config.getNumber('database', 'host', 0)).toThrow(
        'Invalid number for [database] host: db.internal'
      );
      expect(() => config.getBoolean('database', 'host', false)).toThrow(
        'Invalid boolean for [database] host: db.internal'
      );
    });
  });

  describe('typed settings', () => {
    it('should fill defaults for keys the file leaves out', () => {
      const { settings } = new ConfigManager(configPath);

      expect(settings.database).toEqual({
        host: 'db.internal',
        port: 6543,
        name: 'app',
        user: 'app',
        password: '',
      });
      expect(settings.api).toEqual({
        baseUrl: 'https://api.example.test',
        timeout: 12.5,
        maxRetries: 3,
      });
      expect(settings.cache).toEqual({ enabled: false, ttl: 60, maxSize: 1000 });
      expect(settings.logging).toEqual({
        level: 'debug',
        directory: 'logs',
        rotation: 'hourly',
        backupCount: 0,
      });
    });

    it('should let LOG_LEVEL and LOG_DIR override the logging section', () => {
      process.env.LOG_LEVEL = 'warn';
      process.env.LOG_DIR = '/var/tmp/app-logs';

      const config = new ConfigManager(configPath);

      expect(config.logging.level).toBe('warn');
      expect(config.logging.directory).toBe('/var/tmp/app-logs');
    });

    it('should fail validation on an unknown log level', () => {
      const badPath = writeConfig('[logging]\nlevel = verbose\n', 'bad.ini');

      expect(() => new ConfigManager(badPath)).toThrow(
        /^Configuration validation failed:\nlogging\.level: Invalid enum value/
      );
    });

    it('should fail validation on a flag that is not a boolean', () => {
      const badPath = writeConfig('[cache]\nenabled = maybe\n', 'bad.ini');

      expect(() => new ConfigManager(badPath)).toThrow('cache.enabled: Not a boolean: maybe');
    });
  });

  describe('loading', () => {
    it('should throw when the file is missing', () => {
      const missing = path.join(dir, 'missing.ini');

      expect(() => new ConfigManager(missing)).toThrow(`Configuration file not found: ${missing}`);
    });

    it('should pick up changes on reload', () => {
      const config = new ConfigManager(configPath);
      fs.writeFileSync(configPath, '[database]\nhost = replica.internal\n');

      config.reload();

      expect(config.get('database', 'host')).toBe('replica.internal');
      expect(config.database.port).toBe(5432);
    });

    it('should resolve the shared instance from APP_CONFIG_FILE', () => {
      process.env.APP_CONFIG_FILE = configPath;

      const instance = ConfigManager.getInstance();

      expect(instance.path).toBe(configPath);
      expect(ConfigManager.getInstance()).toBe(instance);
    });

    it('should read the shipped configuration file', () => {
      const config = new ConfigManager('config/config.ini');

      expect(config.sections()).toEqual(['database', 'api', 'cache', 'logging']);
      expect(config.get('cache', 'enabled')).toBe('true');
      expect(config.settings.api.baseUrl).toBe('http://localhost:8000');
      expect(config.logging).toEqual({
        level: 'info',
        directory: 'logs',
        rotation: 'daily',
        backupCount: 7,
      });
    });
  });
});

describe('parseConfigText', () => {
  it('should name dotted sections by their full header', () => {
    const sections = parseConfigText('[server.http]\nport = 80\n');

    expect(sections).toEqual({ 'server.http': { port: '80' } });
  });

  it('should keep a written parent header next to its dotted child', () => {
    expect(parseConfigText('[server]\n[server.http]\nport = 80\n')).toEqual({
      server: {},
      'server.http': { port: '80' },
    });
  });

  it('should keep an empty section', () => {
    expect(parseConfigText('[empty]\n')).toEqual({ empty: {} });
  });
});
