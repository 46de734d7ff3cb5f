import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createLogger, type Logger } from '../../logging/logger.js';
import { PinoSecurityEventSink } from '../../logging/security-events.js';
import { createAuthServer } from '../../app.js';
import { createMemoryStorage } from '../../storage/memory/index.js';
import { FakeIdentityProvider, RecordingEventSink, createTestConfig } from '../e2e/test-setup.js';

type LogLine = Record<string, unknown>;

describe('logging', () => {
  let lines: LogLine[];
  let logger: Logger;

  beforeEach(() => {
    lines = [];
    logger = createLogger({
      level: 'info',
      destination: {
        write: (msg: string) => {
          lines.push(JSON.parse(msg));
        },
      },
    });
  });

  it('should write JSON lines with service fields and a level label', () => {
    logger.info({ requestId: 'req-1' }, 'hello');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'info',
      service: 'org-auth',
      version: '0.1.0',
      requestId: 'req-1',
      msg: 'hello',
    });
    expect(typeof lines[0]?.['time']).toBe('string');
  });

  it('should redact token and secret fields', () => {
    logger.info({ token: 'header.payload.sig', nested: { secret: 'test-secret' } }, 'sensitive');

    expect(lines[0]?.['token']).toBe('[redacted]');
    expect(lines[0]?.['nested']).toEqual({ secret: '[redacted]' });
  });

  it('should log rejections as warnings and logins as info', () => {
    const sink = new PinoSecurityEventSink(logger);

    sink.emit({ type: 'token_rejected', reason: 'expired', path: '/secure/whoami' });
    sink.emit({ type: 'login_succeeded', userId: 'user-1', tenantId: 'tenant-1', isNewUser: true });

    expect(lines[0]).toMatchObject({
      level: 'warn',
      component: 'security',
      event: 'token_rejected',
      reason: 'expired',
      path: '/secure/whoami',
      msg: 'security event',
    });
    expect(lines[1]).toMatchObject({
      level: 'info',
      event: 'login_succeeded',
      userId: 'user-1',
      isNewUser: true,
    });
  });

  it('should log requests without their query string', async () => {
    const app = createAuthServer({
      config: createTestConfig(),
      storage: createMemoryStorage(),
      identityProvider: new FakeIdentityProvider(),
      events: new RecordingEventSink(),
      logger,
    });

    const res = await app.request('/auth/callback?state=test-state&code=test-code');

    const completed = lines.find((line) => line['msg'] === 'request completed');
    expect(completed).toMatchObject({
      method: 'GET',
      path: '/auth/callback',
      status: res.status,
    });
    expect(lines.some((line) => JSON.stringify(line).includes('test-code'))).toBe(false);
  });

  it('should log internal error details but answer with the public body', async () => {
    const storage = createMemoryStorage();
    const app = createAuthServer({
      config: createTestConfig(),
      storage,
      identityProvider: new FakeIdentityProvider(),
      events: new RecordingEventSink(),
      logger,
    });
    vi.spyOn(storage.loginAttempts, 'put').mockRejectedValue(new Error('attempt store offline'));

    const res = await app.request('/auth/login');

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: 'service_unavailable',
      error_description: 'The service is temporarily unavailable.',
    });
    expect(lines.find((line) => line['msg'] === 'request failed')).toMatchObject({
      level: 'error',
      code: 'store_unavailable',
      description: 'Login attempt could not be stored',
    });
  });
});
