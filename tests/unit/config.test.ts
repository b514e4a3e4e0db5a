/**
 * Unit Tests for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CONFIG_FILE_NAME,
  ConfigManager,
  DEFAULT_CONFIG,
} from '../../src/core/config.js';

describe('ConfigManager', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'devtasks-config-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  function writeConfig(contents: string): void {
    writeFileSync(join(root, CONFIG_FILE_NAME), contents, 'utf-8');
  }

  it('should use defaults when there is no config file', () => {
    const manager = new ConfigManager(root);

    expect(manager.get()).toEqual(DEFAULT_CONFIG);
    expect(manager.getConfigPath()).toBe(join(root, CONFIG_FILE_NAME));
  });

  it('should merge the config file over the defaults', () => {
    writeConfig(
      JSON.stringify({
        layout: { testsDirectory: 'checks' },
        header: { ciEnvVar: 'CI' },
        verbose: true,
      })
    );

    const config = new ConfigManager(root).get();

    expect(config.layout).toEqual({
      ...DEFAULT_CONFIG.layout,
      testsDirectory: 'checks',
    });
    expect(config.header).toEqual({ ciEnvVar: 'CI', ciWidth: 80, fallbackColumns: 80 });
    expect(config.verbose).toBe(true);
    expect(config.shell).toBe('/bin/bash');
  });

  it('should fall back to defaults on malformed JSON', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeConfig('{ not json');

    expect(new ConfigManager(root).get()).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should fall back to defaults on unknown or invalid settings', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    writeConfig(JSON.stringify({ colour: 'blue' }));
    expect(new ConfigManager(root).get()).toEqual(DEFAULT_CONFIG);

    writeConfig(JSON.stringify({ header: { ciWidth: -1 } }));
    expect(new ConfigManager(root).get()).toEqual(DEFAULT_CONFIG);

    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('should read an explicit config path', () => {
    const path = join(root, 'custom.json');
    writeFileSync(path, JSON.stringify({ python: { venvDirectory: '.env' } }));

    expect(new ConfigManager(root, path).get().python.venvDirectory).toBe('.env');
  });

  it('should hand out copies that do not touch the defaults', () => {
    const manager = new ConfigManager(root);

    const config = manager.get();
    config.header.ciWidth = 120;
    config.layout.reportsDirectory = 'elsewhere';

    expect(DEFAULT_CONFIG.header.ciWidth).toBe(80);
    expect(DEFAULT_CONFIG.layout.reportsDirectory).toBe('reports');
    expect(manager.get().header.ciWidth).toBe(80);
  });

  it('should apply updates', () => {
    const manager = new ConfigManager(root);
    manager.update({ verbose: true, layout: { reportsDirectory: 'out' } });

    expect(manager.get().verbose).toBe(true);
    expect(manager.get().layout.reportsDirectory).toBe('out');
    expect(manager.get().layout.sourceDirectory).toBe('src');
  });
});
