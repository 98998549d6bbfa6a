import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isInitialized, loadSettings, parseSettings, saveSettings, SETTINGS_FILE } from './config.js';

describe('parseSettings', () => {
  it('applies defaults', () => {
    expect(parseSettings({ input: {} })).toEqual({
      configDirectory: 'config',
      templatesDirectory: 'templates',
      stateDirectory: '.stackpilot/state',
      pollIntervalMs: 4000,
      plugins: [],
    });
  });

  it('rejects invalid values and unknown keys', () => {
    expect(() => parseSettings({ input: { maxConcurrency: 0 } })).toThrow(
      'Invalid settings in stackpilot.json: maxConcurrency: Number must be greater than 0'
    );
    expect(() => parseSettings({ input: { colour: 'blue' } })).toThrow(
      "Invalid settings in stackpilot.json: (root): Unrecognized key(s) in object: 'colour'"
    );
  });
});

describe('settings files', () => {
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), 'stackpilot-settings-'));
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it('falls back to defaults without a settings file', async () => {
    expect(await isInitialized({ projectDir })).toBe(false);

    const settings = await loadSettings({ projectDir });
    expect(settings.projectDir).toBe(projectDir);
    expect(settings.configDir).toBe(join(projectDir, 'config'));
    expect(settings.stateDir).toBe(join(projectDir, '.stackpilot', 'state'));
  });

  it('saves and loads settings', async () => {
    await saveSettings({
      projectDir,
      settings: { projectCode: 'acme', region: 'eu-west-1', configDirectory: 'stacks' },
    });

    expect(await isInitialized({ projectDir })).toBe(true);
    const settings = await loadSettings({ projectDir });
    expect(settings.projectCode).toBe('acme');
    expect(settings.region).toBe('eu-west-1');
    expect(settings.configDir).toBe(join(projectDir, 'stacks'));
    expect(settings.templatesDir).toBe(join(projectDir, 'templates'));
  });

  it('rejects a settings file that is not json', async () => {
    await writeFile(join(projectDir, SETTINGS_FILE), '{ projectCode: acme');
    await expect(loadSettings({ projectDir })).rejects.toThrow('stackpilot.json is not valid JSON.');
  });
});
