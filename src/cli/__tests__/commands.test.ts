import fs from 'fs/promises';
import path from 'path';
import ora, { type Ora } from 'ora';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runList, runStats, runUpload } from '../commands.js';
import { DamClient } from '../../client.js';
import { AuthError, ValidationError } from '../../utils/errors.js';
import {
  FakeTransport,
  fileRecord,
  jsonResponse,
  makeTempDir,
  uploadedResponse,
  writeFiles,
  type Handler,
} from '../../lib/__tests__/helpers.js';

let dir: string;
let lines: string[];
let events: string[];

beforeEach(async () => {
  dir = await makeTempDir();
  lines = [];
  events = [];
  vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
    lines.push(String(line));
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(dir, { recursive: true, force: true });
});

function recordingSpinner(text: string): Ora {
  const spinner = ora({ text, isSilent: true });
  const record = (name: string) => (message?: string) => {
    events.push(message === undefined ? name : `${name}:${message}`);
    return spinner;
  };
  vi.spyOn(spinner, 'stop').mockImplementation(record('stop'));
  vi.spyOn(spinner, 'fail').mockImplementation(record('fail'));
  vi.spyOn(spinner, 'warn').mockImplementation(record('warn'));
  vi.spyOn(spinner, 'succeed').mockImplementation(record('succeed'));
  return spinner;
}

function context(handler: Handler) {
  const client = new DamClient({
    apiKey: 'test-secret',
    apiUrl: 'http://dam.test',
    retryPolicy: { backoffBaseMs: 1 },
    transport: new FakeTransport(handler),
  });
  return { client, spinner: recordingSpinner };
}

describe('runStats', () => {
  it('prints both statistics blocks', async () => {
    const ctx = context((request) =>
      request.url.endsWith('/dashboard')
        ? jsonResponse(200, { success: true, data: { total_files: 3 } })
        : jsonResponse(200, { success: true, data: { used_bytes: 2048 } })
    );

    await expect(runStats(ctx)).resolves.toBe(0);

    expect(events).toEqual(['stop']);
    expect(lines).toContain(JSON.stringify({ total_files: 3 }, null, 2));
    expect(lines).toContain(JSON.stringify({ used_bytes: 2048 }, null, 2));
  });

  it('stops the spinner when the service rejects the key', async () => {
    const ctx = context(() => jsonResponse(401, { message: 'Invalid API key' }));

    await expect(runStats(ctx)).rejects.toThrow(AuthError);

    expect(events).toEqual(['fail:Could not fetch statistics']);
  });
});

describe('runList', () => {
  it('prints one line per file and the total', async () => {
    const ctx = context(() =>
      jsonResponse(200, {
        success: true,
        data: [fileRecord({ id: 'a' }), fileRecord({ id: 'b' })],
        pagination: { total: 5, limit: 2, offset: 0 },
      })
    );

    await expect(runList(ctx, 2)).resolves.toBe(0);

    expect(events).toEqual(['stop']);
    expect(lines).toHaveLength(3);
    expect(lines[2]).toContain('2 of 5 files');
  });

  it('stops the spinner when listing fails', async () => {
    const ctx = context(() => jsonResponse(403, { error: 'Forbidden' }));

    await expect(runList(ctx)).rejects.toThrow('Forbidden');

    expect(events).toEqual(['fail:Could not list files']);
  });
});

describe('runUpload', () => {
  it('reports partial failure with exit code 1', async () => {
    const files = await writeFiles(dir, ['a', 'b']);
    const ctx = context((_request, call) =>
      call === 0 ? uploadedResponse('asset-1') : jsonResponse(401, { message: 'Invalid API key' })
    );

    const code = await runUpload(ctx, {
      command: 'upload',
      files,
      destinationPath: '/',
      metadata: {},
      concurrencyLimit: 1,
    });

    expect(code).toBe(1);
    expect(events).toEqual(['warn:1 uploaded, 1 failed, 0 cancelled']);
    expect(lines[1]).toContain('[Auth] Invalid API key (1 attempts)');
  });

  it('exits 0 when every file uploads', async () => {
    const files = await writeFiles(dir, ['a']);
    const ctx = context(() => uploadedResponse('asset-1'));

    const code = await runUpload(ctx, { command: 'upload', files, destinationPath: '/', metadata: {} });

    expect(code).toBe(0);
    expect(events).toEqual(['succeed:1 files uploaded']);
  });

  it('fails the spinner when the batch cannot start', async () => {
    const ctx = context(() => uploadedResponse('asset-1'));

    await expect(
      runUpload(ctx, {
        command: 'upload',
        files: [path.join(dir, 'missing.txt')],
        destinationPath: '/',
        metadata: {},
      })
    ).rejects.toThrow(ValidationError);

    expect(events).toEqual(['fail:Upload could not start']);
  });
});
