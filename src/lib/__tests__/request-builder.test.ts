import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UploadRequestBuilder, authHeaders } from '../request-builder.js';
import { FileTooLargeError, ValidationError } from '../../utils/errors.js';
import { formField, makeTempDir, writeFiles } from './helpers.js';

let dir: string;
let filePath: string;

beforeEach(async () => {
  dir = await makeTempDir();
  [filePath] = await writeFiles(dir, ['hello world']);
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const config = { apiUrl: 'http://dam.test/', apiKey: 'test-secret', userAgent: 'test-agent' };

describe('authHeaders', () => {
  it('sends a bearer token by default', () => {
    expect(authHeaders({ apiKey: 'test-secret' }, 'test-agent')).toEqual({
      Accept: 'application/json',
      'User-Agent': 'test-agent',
      Authorization: 'Bearer test-secret',
    });
  });

  it('sends the key pair when an ID is configured', () => {
    expect(authHeaders({ apiKey: 'test-secret', apiKeyId: 'key-1' }, 'test-agent')).toEqual({
      Accept: 'application/json',
      'User-Agent': 'test-agent',
      'X-API-Key-ID': 'key-1',
      'X-API-Key-Secret': 'test-secret',
    });
  });
});

describe('UploadRequestBuilder', () => {
  it('builds a multipart POST to the upload endpoint', async () => {
    const builder = new UploadRequestBuilder(config);

    const request = await builder.build({
      filePath,
      destinationPath: '/photos/2024',
      metadata: { title: 'Greeting', author: 'test' },
    });

    expect(request.method).toBe('POST');
    expect(request.url).toBe('http://dam.test/api/public/single');
    expect(request.headers.Authorization).toBe('Bearer test-secret');
    expect(request.headers['User-Agent']).toBe('test-agent');
    expect(formField(request, 'path')).toBe('/photos/2024');
    expect(formField(request, 'metadata')).toBe('{"author":"test","title":"Greeting"}');
    expect(formField(request, 'checksum')?.startsWith('bafkrei')).toBe(true);
    expect(formField(request, 'folder_id')).toBeUndefined();
    expect(formField(request, 'original_name')).toBeUndefined();
  });

  it('attaches the file content under its base name', async () => {
    const builder = new UploadRequestBuilder(config);
    const request = await builder.build({ filePath, destinationPath: '/', metadata: {} });

    expect(request.body).toBeInstanceOf(FormData);
    const file = request.body instanceof FormData ? request.body.get('file') : null;
    if (file === null || typeof file === 'string') {
      throw new Error('file part missing');
    }
    expect(file.name).toBe('file-0.txt');
    expect(file.type).toBe('text/plain');
    expect(await file.text()).toBe('hello world');
  });

  it('adds optional folder and display name fields', async () => {
    const builder = new UploadRequestBuilder(config);
    const request = await builder.build({
      filePath,
      destinationPath: '/',
      metadata: {},
      folderId: 'folder-7',
      originalName: 'Greeting.txt',
    });

    expect(formField(request, 'folder_id')).toBe('folder-7');
    expect(formField(request, 'original_name')).toBe('Greeting.txt');
  });

  it('omits the metadata field when there is no metadata', async () => {
    const builder = new UploadRequestBuilder(config);
    const request = await builder.build({ filePath, destinationPath: '/', metadata: {} });

    expect(formField(request, 'metadata')).toBeUndefined();
    expect(formField(request, 'path')).toBe('/');
  });

  it('creates a new body on every call', async () => {
    const builder = new UploadRequestBuilder(config);
    const item = { filePath, destinationPath: '/', metadata: {} };

    const first = await builder.build(item);
    const second = await builder.build(item);

    expect(second.body).not.toBe(first.body);
    expect(formField(second, 'checksum')).toBe(formField(first, 'checksum'));
  });

  it('rejects a relative destination path', async () => {
    const builder = new UploadRequestBuilder(config);
    await expect(builder.build({ filePath, destinationPath: 'photos', metadata: {} })).rejects.toMatchObject({
      name: 'ValidationError',
      field: 'destinationPath',
    });
  });

  it('rejects oversized metadata keys', async () => {
    const builder = new UploadRequestBuilder({ ...config, maxMetadataKeyLength: 4 });
    await expect(
      builder.build({ filePath, destinationPath: '/', metadata: { toolong: 'x' } })
    ).rejects.toThrow('Metadata key "toolong..." exceeds 4 characters');
  });

  it('rejects files above the size limit', async () => {
    const builder = new UploadRequestBuilder({ ...config, maxFileSize: 4 });
    await expect(builder.build({ filePath, destinationPath: '/', metadata: {} })).rejects.toThrow(
      FileTooLargeError
    );
  });

  it('rejects empty files', async () => {
    const empty = path.join(dir, 'empty.txt');
    await fs.writeFile(empty, '');
    const builder = new UploadRequestBuilder(config);
    await expect(builder.build({ filePath: empty, destinationPath: '/', metadata: {} })).rejects.toThrow(
      'File size must be greater than 0'
    );
  });

  it('reports unreadable files as validation errors', async () => {
    const builder = new UploadRequestBuilder(config);
    await expect(
      builder.build({ filePath: path.join(dir, 'gone.txt'), destinationPath: '/', metadata: {} })
    ).rejects.toThrow(ValidationError);
  });
});
