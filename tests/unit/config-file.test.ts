/**
 * Unit tests for config-file utility
 *
 * Tests YAML loading and error handling for missing, empty and broken files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { checkConfigFileAt, loadYamlFileAt, loadDefaultsYaml } from '../../src/app/config-file.js';

let tmpDir: string;
let configPath: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'config-file-test-'));
  configPath = join(tmpDir, 'config.yaml');
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('checkConfigFileAt', () => {
  it('returns exists: false when file does not exist', () => {
    const status = checkConfigFileAt(configPath);
    expect(status.exists).toBe(false);
    expect(status.error).toBeNull();
  });

  it('detects directory and returns error message', () => {
    mkdirSync(configPath);
    const status = checkConfigFileAt(configPath);
    expect(status.exists).toBe(true);
    expect(status.isDirectory).toBe(true);
    expect(status.error).toBe(`${configPath} is a directory, not a file.\nFix: rm -rf ${configPath} && touch ${configPath}`);
  });

  it('detects empty file', () => {
    writeFileSync(configPath, '  \n');
    const status = checkConfigFileAt(configPath);
    expect(status.exists).toBe(true);
    expect(status.isEmpty).toBe(true);
    expect(status.error).toBeNull();
  });
});

describe('loadYamlFileAt', () => {
  it('returns empty object for missing file', () => {
    expect(loadYamlFileAt(configPath)).toEqual({});
  });

  it('returns empty object for a comment-only file', () => {
    writeFileSync(configPath, '# nothing here\n');
    expect(loadYamlFileAt(configPath)).toEqual({});
  });

  it('parses nested mappings', () => {
    writeFileSync(configPath, 'bw:\n  executable: /opt/bw\n  timeoutSeconds: 10\n');
    expect(loadYamlFileAt(configPath)).toEqual({ bw: { executable: '/opt/bw', timeoutSeconds: 10 } });
  });

  it('throws on invalid YAML', () => {
    writeFileSync(configPath, 'bw: [unclosed\n');
    expect(() => loadYamlFileAt(configPath)).toThrow(`Invalid YAML in ${configPath}`);
  });

  it('throws when the top level is not a mapping', () => {
    writeFileSync(configPath, '- a\n- b\n');
    expect(() => loadYamlFileAt(configPath)).toThrow(`${configPath} must contain a mapping at the top level`);
  });

  it('throws when the path is a directory', () => {
    mkdirSync(configPath);
    expect(() => loadYamlFileAt(configPath)).toThrow('is a directory, not a file');
  });
});

describe('loadDefaultsYaml', () => {
  it('requires the file to exist', () => {
    expect(() => loadDefaultsYaml(configPath)).toThrow(`Failed to load ${configPath}: file not found`);
  });

  it('loads the bundled defaults', () => {
    const defaults = loadDefaultsYaml();
    expect(defaults.bw).toEqual({ executable: 'bw', timeoutSeconds: 40 });
  });
});
