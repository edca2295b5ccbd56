/**
 * @fileoverview Unit tests for loadConfig
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from '../../../src/config/loader';
import { DEFAULT_CONFIG } from '../../../src/config/types';
import { ConfigLoadError, ConfigValidationError } from '../../../src/config/errors';

describe('loadConfig', () => {
  let dir: string;

  function writeConfig(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, 'utf8');
    return file;
  }

  function captureError(fn: () => unknown): unknown {
    try {
      fn();
    } catch (error) {
      return error;
    }
    return undefined;
  }

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'varexport-config-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should return defaults with no file and no environment', () => {
    expect(loadConfig({ env: {} })).toEqual({
      logging: { level: 'info', format: 'json', name: 'varexport' },
      dump: { includeDoc: false },
    });
    expect(loadConfig({ env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('should read values from a YAML file', () => {
    const file = writeConfig('full.yaml', 'logging:\n  level: debug\ndump:\n  includeDoc: true\n');

    expect(loadConfig({ configPath: file, env: {} })).toEqual({
      logging: { level: 'debug', format: 'json', name: 'varexport' },
      dump: { includeDoc: true },
    });
  });

  it('should find the file through VAREXPORT_CONFIG', () => {
    const file = writeConfig('env-path.yaml', 'logging:\n  format: pretty\n');

    expect(loadConfig({ env: { VAREXPORT_CONFIG: file } }).logging.format).toBe('pretty');
  });

  it('should treat an empty file as defaults', () => {
    const file = writeConfig('empty.yaml', '');

    expect(loadConfig({ configPath: file, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('should let environment variables override the file', () => {
    const file = writeConfig('override.yaml', 'logging:\n  level: debug\n  name: worker\n');

    const config = loadConfig({
      configPath: file,
      env: { VAREXPORT_LOG_LEVEL: 'warn', VAREXPORT_DUMP_INCLUDE_DOC: 'TRUE' },
    });

    expect(config.logging).toEqual({ level: 'warn', format: 'json', name: 'worker' });
    expect(config.dump.includeDoc).toBe(true);
  });

  it('should ignore empty environment values', () => {
    expect(loadConfig({ env: { VAREXPORT_LOG_LEVEL: '' } }).logging.level).toBe('info');
  });

  it('should throw ConfigLoadError for a missing file', () => {
    const missing = path.join(dir, 'missing.yaml');

    const error = captureError(() => loadConfig({ configPath: missing, env: {} }));

    expect(error).toBeInstanceOf(ConfigLoadError);
    expect(error).toMatchObject({ message: `Failed to read config file: ${missing}` });
  });

  it('should throw ConfigLoadError for invalid YAML', () => {
    const file = writeConfig('broken.yaml', 'logging: [unclosed\n');

    expect(() => loadConfig({ configPath: file, env: {} })).toThrow(ConfigLoadError);
  });

  it('should throw ConfigLoadError when the file is not a mapping', () => {
    const file = writeConfig('list.yaml', '- a\n- b\n');

    expect(() => loadConfig({ configPath: file, env: {} })).toThrow(
      `Config file ${file} must contain a mapping`,
    );
  });

  it('should throw ConfigValidationError naming the invalid field', () => {
    const error = captureError(() => loadConfig({ env: { VAREXPORT_LOG_LEVEL: 'verbose' } }));

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toMatchObject({ field: 'logging.level', value: 'verbose' });
  });

  it('should reject non-boolean includeDoc values', () => {
    const error = captureError(() => loadConfig({ env: { VAREXPORT_DUMP_INCLUDE_DOC: 'yes' } }));

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toMatchObject({ field: 'dump.includeDoc', value: 'yes' });
  });

  it('should reject unknown sections', () => {
    const file = writeConfig('unknown.yaml', 'metrics:\n  enabled: true\n');

    const error = captureError(() => loadConfig({ configPath: file, env: {} }));

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toMatchObject({ field: '' });
  });
});
