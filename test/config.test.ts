import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  getConfigSearchPaths,
  loadConfigFile,
  mergeConfig,
  resolveConfig,
  validateConfig
} from '../src/config';
import { UsageError } from '../src/errors';

describe('config', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'spm-lens-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: string, name = CONFIG_FILE_NAME): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, content, 'utf8');
    return filePath;
  }

  it('searches the project directory before the home directory', () => {
    expect(getConfigSearchPaths('/work/project')).toEqual([
      path.join('/work/project', '.spm-lens.yaml'),
      path.join(os.homedir(), '.spm-lens.yaml')
    ]);
  });

  describe('loadConfigFile', () => {
    it('returns undefined for a missing file', () => {
      expect(loadConfigFile(path.join(tmpDir, 'missing.yaml'))).toBeUndefined();
    });

    it('loads known keys', () => {
      const filePath = writeConfig('format: summary\nseverity: warning\nmetrics: true\nverbose: false\n');
      expect(loadConfigFile(filePath)).toEqual({ format: 'summary', severity: 'warning', metrics: true, verbose: false });
    });

    it('drops invalid values', () => {
      const filePath = writeConfig('format: xml\nseverity: loud\nmetrics: "yes"\n');
      expect(loadConfigFile(filePath)).toEqual({});
    });

    it('returns undefined when the document is not a mapping', () => {
      expect(loadConfigFile(writeConfig('- json\n- summary\n'))).toBeUndefined();
    });

    it('returns undefined for malformed YAML', () => {
      expect(loadConfigFile(writeConfig('format: [unclosed\n'))).toBeUndefined();
    });
  });

  describe('validateConfig', () => {
    it('rejects non-objects', () => {
      expect(validateConfig(null)).toBeUndefined();
      expect(validateConfig('json')).toBeUndefined();
    });
  });

  describe('mergeConfig', () => {
    it('overrides only the keys that are set', () => {
      expect(mergeConfig(DEFAULT_CONFIG, { severity: 'error' })).toEqual({
        format: 'json',
        severity: 'error',
        metrics: false,
        verbose: false
      });
    });

    it('copies the base without an override', () => {
      const merged = mergeConfig(DEFAULT_CONFIG);
      expect(merged).toEqual(DEFAULT_CONFIG);
      expect(merged).not.toBe(DEFAULT_CONFIG);
    });
  });

  describe('resolveConfig', () => {
    it('uses an explicit path', () => {
      const filePath = writeConfig('format: detailed\n', 'custom.yaml');
      expect(resolveConfig(filePath).format).toBe('detailed');
    });

    it('rejects an explicit path that does not exist', () => {
      const missing = path.join(tmpDir, 'missing.yaml');
      expect(() => resolveConfig(missing)).toThrow(UsageError);
      expect(() => resolveConfig(missing)).toThrow(`Config file not found: ${missing}`);
    });

    it('uses defaults for an explicit file with no settings', () => {
      const filePath = writeConfig('', 'empty.yaml');
      expect(resolveConfig(filePath)).toEqual(DEFAULT_CONFIG);
    });

    it('finds the file in the project directory', () => {
      writeConfig('metrics: true\n');
      expect(resolveConfig(undefined, tmpDir)).toEqual({ ...DEFAULT_CONFIG, metrics: true });
    });
  });
});
