/**
 * Unit tests for config loading and validation
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import {
  loadConfig,
  getBwConfig,
  getPromptConfig,
  getSessionConfig,
  getLogConfig,
} from '../../src/app/config.js';
import { getDefaultsPath } from '../../src/app/config-file.js';

let tmpDir: string;
let userPath: string;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'config-test-'));
  userPath = join(tmpDir, 'config.yaml');
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('defaults', () => {
  it('are loaded by the test setup', () => {
    expect(getBwConfig()).toEqual({ executable: 'bw', timeoutSeconds: 40 });
    expect(getPromptConfig()).toEqual({
      program: 'pinentry',
      description: 'Enter your Bitwarden Password',
      prompt: '>',
      timeoutSeconds: 120,
    });
    expect(getSessionConfig()).toEqual({ username: '' });
    expect(getLogConfig().target).toBe('stdout');
  });
});

describe('loadConfig', () => {
  it('deep-merges config.yaml over the defaults', () => {
    writeFileSync(userPath, 'bw:\n  timeoutSeconds: 5\nsession:\n  username: me@example.com\n');

    const config = loadConfig({ defaultsPath: getDefaultsPath(), configPath: userPath });

    expect(config.bw).toEqual({ executable: 'bw', timeoutSeconds: 5 });
    expect(config.session.username).toBe('me@example.com');
    expect(config.prompt.program).toBe('pinentry');
  });

  it('uses the defaults alone when config.yaml is missing', () => {
    const config = loadConfig({ defaultsPath: getDefaultsPath(), configPath: userPath });

    expect(config.log).toEqual({ level: 'info', target: 'stdout', filePath: 'logs/bw-session.log' });
  });

  it('rejects invalid values and lists each issue', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    writeFileSync(userPath, 'bw:\n  timeoutSeconds: -1\nlog:\n  level: loud\n');

    expect(() => loadConfig({ defaultsPath: getDefaultsPath(), configPath: userPath })).toThrow(
      'Invalid configuration. Please check config.yaml and config.defaults.yaml',
    );
    expect(consoleError).toHaveBeenCalledWith('Configuration validation failed:');
    expect(consoleError).toHaveBeenCalledWith(expect.stringMatching(/^ {2}- bw\.timeoutSeconds: /));
    expect(consoleError).toHaveBeenCalledWith(expect.stringMatching(/^ {2}- log\.level: /));
  });

  it('rejects an empty executable', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    writeFileSync(userPath, 'bw:\n  executable: ""\n');

    expect(() => loadConfig({ defaultsPath: getDefaultsPath(), configPath: userPath })).toThrow('Invalid configuration');
  });
});
