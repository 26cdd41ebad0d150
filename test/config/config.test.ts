import fs from 'node:fs';
import path from 'node:path';
import {
  DEFAULT_CONFIG,
  getOrSetConfig,
  loadConfig,
  writeDefaultConfig,
} from '../../src/config/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir } from '../helpers.js';

describe('config', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = makeTempDir();
    configPath = path.join(tmpDir, 'nested', 'config.yml');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function write(content: string): void {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, content);
  }

  it('returns defaults when the file is missing', () => {
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('returns defaults for an empty file', () => {
    write('');
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('fills missing keys with defaults', () => {
    write('verboseThreshold: 3\n');
    expect(loadConfig(configPath)).toEqual({ ...DEFAULT_CONFIG, verboseThreshold: 3 });
  });

  it('rejects invalid values', () => {
    write('version: 1\ninactivityWindowMinutes: 0\n');
    expect(() => loadConfig(configPath)).toThrow(ConfigError);
    expect(() => loadConfig(configPath)).toThrow('inactivityWindowMinutes');
  });

  it('rejects malformed YAML', () => {
    write('verboseThreshold: [\n');
    expect(() => loadConfig(configPath)).toThrow(/Could not parse/);
  });

  it('writes the defaults only once', () => {
    expect(writeDefaultConfig(configPath)).toBe(true);
    expect(writeDefaultConfig(configPath)).toBe(false);
    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });

  describe('getOrSetConfig', () => {
    it('reads a key', () => {
      expect(getOrSetConfig('verboseThreshold', undefined, configPath)).toBe(5);
    });

    it('sets and persists a key', () => {
      expect(getOrSetConfig('verboseThreshold', '3', configPath)).toBe(3);
      expect(getOrSetConfig('fileDisplayLimit', 12, configPath)).toBe(12);
      expect(loadConfig(configPath)).toEqual({
        ...DEFAULT_CONFIG,
        verboseThreshold: 3,
        fileDisplayLimit: 12,
      });
    });

    it('accepts a threshold of 0', () => {
      expect(getOrSetConfig('verboseThreshold', '0', configPath)).toBe(0);
    });

    it('rejects unknown keys', () => {
      expect(() => getOrSetConfig('colour', '1', configPath)).toThrow('Unknown config key "colour"');
    });

    it('rejects values that fail validation', () => {
      expect(() => getOrSetConfig('verboseThreshold', 'many', configPath)).toThrow(ConfigError);
      expect(() => getOrSetConfig('verboseThreshold', '', configPath)).toThrow(ConfigError);
      expect(() => getOrSetConfig('fileDisplayLimit', '0', configPath)).toThrow(ConfigError);
      expect(() => getOrSetConfig('verboseThreshold', '2.5', configPath)).toThrow(ConfigError);
      expect(fs.existsSync(configPath)).toBe(false);
    });
  });
});
