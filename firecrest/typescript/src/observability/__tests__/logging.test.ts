import { describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, logError } from '../logging.js';

describe('ConsoleLogger', () => {
  it('should drop messages below the configured level', () => {
    const logger = new ConsoleLogger({ level: 'warn' });

    expect(logger.format('info', 'Polling task')).toBeUndefined();
    expect(logger.format('warn', 'Polling task', undefined)).toContain('[WARN] Polling task');
  });

  it('should render compact lines', () => {
    const logger = new ConsoleLogger({ format: 'compact' });

    expect(logger.format('info', 'Task 7 has status 111', { taskId: '7' })).toBe(
      '[INFO] Task 7 has status 111 {"taskId":"7"}'
    );
  });

  it('should render json lines without a timestamp when disabled', () => {
    const logger = new ConsoleLogger({ format: 'json', includeTimestamps: false });

    expect(logger.format('error', 'Upload failed', { status: 403 })).toBe(
      '{"level":"error","message":"Upload failed","status":403}'
    );
  });

  it('should write warnings to stderr', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ format: 'compact' });

    logger.warn('Could not parse Retry-After header');
    logger.info('Uploading file to the staging area');

    expect(stderr).toHaveBeenCalledWith('[WARN] Could not parse Retry-After header');
    expect(stdout).toHaveBeenCalledWith('[INFO] Uploading file to the staging area');
  });
});

describe('logError', () => {
  it('should log the error name and message', () => {
    const logger = new ConsoleLogger({ format: 'compact' });
    const error = vi.spyOn(logger, 'error').mockImplementation(() => undefined);

    logError(logger, new TypeError('fetch failed'), 'GET /tasks');

    expect(error).toHaveBeenCalledWith('Error occurred', {
      context: 'GET /tasks',
      errorName: 'TypeError',
      errorMessage: 'fetch failed',
    });
  });
});
