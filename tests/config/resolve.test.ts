import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { resolveConfig } from '../../src/config/resolve.js';
import { defaultConfig } from '../../src/config/env.js';
import { makeTempDir, removeTempDir, writeFixture } from '../helpers.js';

describe('resolveConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('loads an explicit path relative to the working directory', async () => {
    await writeFixture(dir, 'custom/bot.yaml', 'discord:\n  application_id: explicit\n');
    const resolved = await resolveConfig({ configPath: 'custom/bot.yaml', cwd: dir, env: {} });
    expect(resolved.path).toBe('custom/bot.yaml');
    expect(resolved.config.discord.applicationId).toBe('explicit');
  });

  it('wraps a failed explicit load with the path', async () => {
    await expect(
      resolveConfig({ configPath: '/no/such/file', cwd: dir, env: {} }),
    ).rejects.toThrow(/^failed to load config \/no\/such\/file: failed to read config file: /);
  });

  it('keeps the error kind when wrapping', async () => {
    await writeFixture(dir, 'bad.yaml', 'client:\n  timeout: soon\n');
    await expect(
      resolveConfig({ configPath: 'bad.yaml', cwd: dir, env: {} }),
    ).rejects.toMatchObject({ kind: 'CONFIG_PARSE', path: 'bad.yaml' });
  });

  it('takes the first search path that exists', async () => {
    await writeFixture(dir, 'discord.yaml', 'discord:\n  application_id: second\n');
    await writeFixture(dir, 'config/discord.yaml', 'discord:\n  application_id: third\n');
    const resolved = await resolveConfig({ cwd: dir, env: {} });
    expect(resolved.path).toBe('discord.yaml');
    expect(resolved.config.discord.applicationId).toBe('second');
  });

  it('prefers discord-config.yaml over the others', async () => {
    await writeFixture(dir, 'discord-config.yaml', 'discord:\n  application_id: first\n');
    await writeFixture(dir, 'discord.yaml', 'discord:\n  application_id: second\n');
    const resolved = await resolveConfig({ cwd: dir, env: {} });
    expect(resolved.path).toBe('discord-config.yaml');
  });

  it('finds config/discord.yaml last', async () => {
    await writeFixture(dir, 'config/discord.yaml', 'discord:\n  application_id: third\n');
    const resolved = await resolveConfig({ cwd: dir, env: {} });
    expect(resolved.path).toBe('config/discord.yaml');
    expect(resolved.config.discord.applicationId).toBe('third');
  });

  it('does not wrap a parse failure in a discovered file', async () => {
    await writeFixture(dir, 'discord.yaml', 'client:\n  retries: many\n');
    await expect(resolveConfig({ cwd: dir, env: {} })).rejects.toThrow(
      /^failed to parse config file: client\.retries: /,
    );
  });

  it('falls back to the environment when no file exists', async () => {
    const env = { DISCORD_BOT_TOKEN: 'test-token' };
    const resolved = await resolveConfig({ cwd: dir, env });
    expect(resolved.path).toBeUndefined();
    expect(resolved.config).toEqual(defaultConfig(env));
  });

  it('ignores an empty explicit path', async () => {
    const resolved = await resolveConfig({ configPath: '', cwd: dir, env: {} });
    expect(resolved.path).toBeUndefined();
  });
});
