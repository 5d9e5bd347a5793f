import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockFetch } from '../../__mocks__/mock-fetch.js';
import { StaticTokenAuth } from '../../auth/authorization.js';
import {
  InvalidStateError,
  LocalIoError,
  RequestFailureError,
  TransferFailureError,
} from '../../errors/categories.js';
import { NoopLogger } from '../../observability/logging.js';
import { RateLimiter } from '../../resilience/rate-limiter.js';
import { TaskPoller } from '../../tasks/task-poller.js';
import { TasksService } from '../../tasks/tasks-service.js';
import { FetchHttpTransport } from '../../transport/http-transport.js';
import { FetchObjectStorageTransfer } from '../../transport/object-storage.js';
import { ExternalUpload } from '../external-upload.js';
import type { TransferContext } from '../types.js';

const STAGING_URL = 'https://staging.example.com/bucket';

const FORM_READY = {
  msg: {
    command: 'curl --show-error -s -i -X POST https://staging.example.com/bucket',
    parameters: {
      method: 'POST',
      url: STAGING_URL,
      data: { key: 'uploads/input.txt', policy: 'test-policy' },
      headers: {},
      params: { signature: 'test-signature' },
      json: {},
      files: 'input.txt',
    },
  },
};

function createContext(mock: MockFetch): TransferContext {
  const logger = new NoopLogger();
  const transport = new FetchHttpTransport({
    baseUrl: 'https://firecrest.example.com',
    authorization: new StaticTokenAuth('test-token'),
    rateLimiter: new RateLimiter({ defaultIntervalMs: 0 }),
    timeout: 5000,
    fetch: mock.fetch,
    logger,
  });
  const tasks = new TasksService(transport);
  return {
    transport,
    tasks,
    poller: new TaskPoller(tasks, logger),
    objectStorage: new FetchObjectStorageTransfer(logger, mock.fetch),
    logger,
  };
}

describe('ExternalUpload', () => {
  let dir: string;
  let localPath: string;
  let mock: MockFetch;
  let context: TransferContext;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'firecrest-upload-'));
    localPath = join(dir, 'input.txt');
    await writeFile(localPath, 'payload');
    mock = new MockFetch();
    context = createContext(mock);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function initiated(): Promise<ExternalUpload> {
    mock.enqueueTaskCreated('7');
    const upload = new ExternalUpload(context, 'cluster', localPath, '/scratch/input.txt');
    await upload.initiate();
    return upload;
  }

  it('should create the staging task', async () => {
    const upload = await initiated();

    expect(upload.taskId).toBe('7');
    expect(upload.lifecycle).toBe('staged');
    const request = mock.getLastRequest();
    expect(request?.url).toBe('https://firecrest.example.com/storage/xfer-external/upload');
    expect(request?.method).toBe('POST');
    expect(request?.headers['x-machine-name']).toBe('cluster');
    const fields = new URLSearchParams(String(request?.body));
    expect(fields.get('sourcePath')).toBe(localPath);
    expect(fields.get('targetPath')).toBe('/scratch/input.txt');
  });

  it('should reject a second initiate', async () => {
    const upload = await initiated();

    await expect(upload.initiate()).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('should send the file exactly once for 110, 111, 112, 113, 114', async () => {
    const upload = await initiated();
    mock
      .enqueueTask('7', '110')
      .enqueueTask('7', '111', FORM_READY)
      .enqueueTextResponse(204, '')
      .enqueueTask('7', '112')
      .enqueueTask('7', '113')
      .enqueueTask('7', '114');

    await upload.finishUpload();

    expect(upload.lifecycle).toBe('finished');
    expect(mock.requestsTo('/tasks')).toHaveLength(5);
    const staging = mock.requestsTo(STAGING_URL);
    expect(staging).toHaveLength(1);
    expect(staging[0]?.method).toBe('POST');
    expect(staging[0]?.url).toBe(`${STAGING_URL}?signature=test-signature`);
    expect(staging[0]?.headers['authorization']).toBeUndefined();

    const body = staging[0]?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get('key')).toBe('uploads/input.txt');
      expect(body.get('policy')).toBe('test-policy');
      const file = body.get('file');
      expect(file).toBeInstanceOf(Blob);
      if (file instanceof Blob) {
        await expect(file.text()).resolves.toBe('payload');
      }
    }
    expect(mock.pendingResponses()).toBe(0);
  });

  it('should reject a second finishUpload after success without any request', async () => {
    const upload = await initiated();
    mock
      .enqueueTask('7', '111', FORM_READY)
      .enqueueTextResponse(204, '')
      .enqueueTask('7', '114');
    await upload.finishUpload();
    mock.clearRequests();

    await expect(upload.finishUpload()).rejects.toBeInstanceOf(InvalidStateError);
    mock.verifyRequestCount(0);
  });

  it('should fail on 115 after the file was sent and stop polling', async () => {
    const upload = await initiated();
    mock
      .enqueueTask('7', '110')
      .enqueueTask('7', '111', FORM_READY)
      .enqueueTextResponse(204, '')
      .enqueueTask('7', '112')
      .enqueueTask('7', '115', 'Download from Object Storage error')
      .enqueueTask('7', '115');

    const error = await upload.finishUpload().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransferFailureError);
    if (error instanceof TransferFailureError) {
      expect(error.task.status).toBe(115);
    }
    expect(upload.lifecycle).toBe('failed');
    expect(mock.pendingResponses()).toBe(1);
  });

  it('should fail on 115 before the form is ready without sending the file', async () => {
    const upload = await initiated();
    mock.enqueueTask('7', '110').enqueueTask('7', '115');

    await expect(upload.finishUpload()).rejects.toBeInstanceOf(TransferFailureError);
    expect(mock.requestsTo(STAGING_URL)).toHaveLength(0);
    expect(upload.lifecycle).toBe('failed');
  });

  it('should check the local file before any poll', async () => {
    const upload = await initiated();
    await rm(localPath);
    mock.clearRequests();

    const error = await upload.finishUpload().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LocalIoError);
    if (error instanceof LocalIoError) {
      expect(error.path).toBe(localPath);
      expect(error.details).toMatchObject({ code: 'ENOENT' });
    }
    mock.verifyRequestCount(0);
    expect(upload.lifecycle).toBe('staged');
  });

  it('should reject a directory as the local file', async () => {
    const upload = new ExternalUpload(context, 'cluster', dir, '/scratch/dir', '7');

    await expect(upload.finishUpload()).rejects.toThrow(`${dir} is not a regular file`);
    mock.verifyRequestCount(0);
  });

  it('should keep the transfer retryable when the staging area rejects the file', async () => {
    const upload = await initiated();
    mock
      .enqueueTask('7', '111', FORM_READY)
      .enqueueTextResponse(403, 'AccessDenied')
      .enqueueTextResponse(204, '')
      .enqueueTask('7', '114');

    const error = await upload.finishUpload().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RequestFailureError);
    if (error instanceof RequestFailureError) {
      expect(error.status).toBe(403);
      expect(error.responseBody).toBe('AccessDenied');
    }
    expect(upload.lifecycle).toBe('staged');

    await upload.finishUpload();

    expect(upload.lifecycle).toBe('finished');
    expect(mock.requestsTo(STAGING_URL)).toHaveLength(2);
    expect(mock.requestsTo('/tasks')).toHaveLength(2);
  });

  it('should reject a form that is missing its URL', async () => {
    const upload = await initiated();
    mock.enqueueTask('7', '111', { msg: { parameters: { method: 'POST' } } });

    await expect(upload.finishUpload()).rejects.toThrow('Task 7 reached status 111 without an upload form');
    expect(mock.requestsTo(STAGING_URL)).toHaveLength(0);
  });

  it('should reject any operation before initiate', async () => {
    const upload = new ExternalUpload(context, 'cluster', localPath, '/scratch/input.txt');

    await expect(upload.finishUpload()).rejects.toBeInstanceOf(InvalidStateError);
    await expect(upload.status()).rejects.toBeInstanceOf(InvalidStateError);
    await expect(upload.objectStorageData()).rejects.toBeInstanceOf(InvalidStateError);
    await expect(upload.invalidateObjectStorageLink()).rejects.toBeInstanceOf(InvalidStateError);
    mock.verifyRequestCount(0);
  });

  it('should return the staging form once status 111 is reached', async () => {
    const upload = await initiated();
    mock.enqueueTask('7', '110').enqueueTask('7', '111', FORM_READY);

    const form = await upload.objectStorageData();

    expect(form).toEqual({
      method: 'POST',
      url: STAGING_URL,
      data: { key: 'uploads/input.txt', policy: 'test-policy' },
      headers: {},
      params: { signature: 'test-signature' },
    });
    await expect(upload.objectStorageData()).resolves.toBe(form);
    expect(mock.requestsTo('/tasks')).toHaveLength(2);
  });

  it('should report progress without advancing the transfer', async () => {
    const upload = await initiated();
    mock.enqueueTask('7', '110').enqueueTask('7', '114');

    await expect(upload.inProgress()).resolves.toBe(true);
    await expect(upload.inProgress()).resolves.toBe(false);
    expect(upload.lifecycle).toBe('staged');
  });
});
