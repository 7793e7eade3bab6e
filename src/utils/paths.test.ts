import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PathResolver } from './paths.ts';

describe('PathResolver', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('returns the project directory', () => {
    expect(PathResolver.getProjectDir()).toBe(join(process.cwd(), '.stepline'));
  });

  it('respects XDG_CONFIG_HOME', () => {
    process.env.XDG_CONFIG_HOME = '/custom/config';
    expect(PathResolver.getUserConfigDir()).toBe('/custom/config/stepline');
  });

  it('falls back to ~/.config if XDG_CONFIG_HOME is not set', () => {
    delete process.env.XDG_CONFIG_HOME;
    expect(PathResolver.getUserConfigDir()).toBe(join(homedir(), '.config', 'stepline'));
  });

  it('puts STEPLINE_CONFIG first', () => {
    process.env.STEPLINE_CONFIG = '/absolute/path/to/config.yaml';
    const paths = PathResolver.getConfigPaths();
    expect(paths[0]).toBe('/absolute/path/to/config.yaml');
    expect(paths).toHaveLength(5);
  });

  it('lists project config before user config', () => {
    delete process.env.STEPLINE_CONFIG;
    process.env.XDG_CONFIG_HOME = '/xdg';
    expect(PathResolver.getConfigPaths()).toEqual([
      join(process.cwd(), '.stepline', 'config.yaml'),
      join(process.cwd(), '.stepline', 'config.yml'),
      '/xdg/stepline/config.yaml',
      '/xdg/stepline/config.yml',
    ]);
  });

  it('resolves workflow-relative paths', () => {
    expect(PathResolver.resolveFromWorkflow('schemas/a.json', '/work/flows')).toBe(
      '/work/flows/schemas/a.json'
    );
    expect(PathResolver.resolveFromWorkflow('/abs/a.json', '/work/flows')).toBe('/abs/a.json');
    expect(PathResolver.resolveFromWorkflow('a.json')).toBe(resolve('a.json'));
  });
});
