import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import type { CliIO } from '../src/cli/index.js';
import type { Env } from '../src/config/index.js';
import type { Config } from '../src/schema/index.js';

export interface MemoryStream {
  stream: Writable;
  text(): string;
}

export function memoryStream(): MemoryStream {
  const chunks: string[] = [];
  const stream = new Writable({
    write(
      chunk: Buffer | string,
      _encoding: BufferEncoding,
      callback: (error?: Error | null) => void,
    ) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

export interface MemoryIO {
  io: CliIO;
  stdout: () => string;
  stderr: () => string;
}

export function memoryIO(cwd: string, env: Env = {}): MemoryIO {
  const out = memoryStream();
  const err = memoryStream();
  return {
    io: { stdout: out.stream, stderr: err.stream, cwd, env },
    stdout: out.text,
    stderr: err.text,
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), 'discord-cli-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(
  dir: string,
  relative: string,
  contents: string,
): Promise<string> {
  const target = path.join(dir, relative);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, contents, 'utf-8');
  return target;
}

export function sampleConfig(overrides: Partial<Config['discord']> = {}): Config {
  return {
    discord: {
      botToken: 'test-token',
      applicationId: '1234',
      webhooks: { default: 'https://example.test/hooks/default' },
      ...overrides,
    },
    client: {
      timeoutMs: 30_000,
      retries: 3,
      rateLimit: { strategy: 'adaptive', backoffBaseMs: 1_000, backoffMaxMs: 60_000 },
    },
    logging: { level: 'info', format: 'json', output: 'stderr' },
  };
}
