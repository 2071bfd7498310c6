import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  closeLogging,
  configureLogging,
  createLogger,
  envLogThreshold,
  logApiRequest,
  redactSensitiveData,
  shouldLog,
} from '@/lib/logging';

describe('redactSensitiveData', () => {
  it('redacts credential keys at any depth', () => {
    expect(
      redactSensitiveData({
        client_secret: 'test-secret',
        backend: 'destination',
        tokens: { accessToken: 'a', refreshToken: 'b', expiresIn: 3600 },
        headers: [{ Authorization: 'Zoho-oauthtoken a' }],
      })
    ).toEqual({
      client_secret: '[REDACTED]',
      backend: 'destination',
      tokens: { accessToken: '[REDACTED]', refreshToken: '[REDACTED]', expiresIn: 3600 },
      headers: [{ Authorization: '[REDACTED]' }],
    });
  });

  it('keeps envelope and status codes', () => {
    expect(redactSensitiveData({ code: 11002, statusCode: 400, password: 'test-secret' })).toEqual({
      code: 11002,
      statusCode: 400,
      password: '[REDACTED]',
    });
  });

  it('keeps only the name and message of errors', () => {
    expect(redactSensitiveData({ error: new TypeError('bad input') })).toEqual({
      error: { name: 'TypeError', message: 'bad input' },
    });
  });
});

describe('envLogThreshold', () => {
  const original = process.env.LOG_LEVEL;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = original;
    }
  });

  it('reads a known level case-insensitively', () => {
    process.env.LOG_LEVEL = 'ERROR';
    expect(envLogThreshold()).toBe('error');
  });

  it('ignores unset and unknown levels', () => {
    delete process.env.LOG_LEVEL;
    expect(envLogThreshold()).toBeUndefined();
    process.env.LOG_LEVEL = 'constructor';
    expect(envLogThreshold()).toBeUndefined();
  });
});

describe('log sinks', () => {
  afterEach(async () => {
    await closeLogging();
    configureLogging({ level: 'silent' });
    jest.restoreAllMocks();
  });

  it('appends JSON lines to the log file and honours the threshold', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'books-migrate-log-'));
    const file = path.join(dir, 'logs', 'run.log');

    configureLogging({ level: 'info', filePath: file });
    const log = createLogger('migration');
    log.debug('not written');
    log.info('Stage finished', { stage: 'taxes', refresh_token: 'zoho-refresh-0' });
    await closeLogging();

    const lines = (await fs.readFile(file, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'info',
      service: 'migration',
      message: 'Stage finished',
      stage: 'taxes',
      refresh_token: '[REDACTED]',
    });
    expect(shouldLog('debug')).toBe(false);

    await fs.rm(dir, { recursive: true, force: true });
  });

  it('strips credentials from logged URLs', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    configureLogging({ level: 'debug' });

    logApiRequest(createLogger('auth'), 'POST', 'https://accounts.zoho.com/oauth/v2/token?refresh_token=r1&client_id=c', 'c1');

    const entry: unknown = JSON.parse(String(debug.mock.calls[0][0]));
    expect(entry).toMatchObject({
      url: 'https://accounts.zoho.com/oauth/v2/token?refresh_token=[REDACTED]&client_id=c',
    });
  });
});
