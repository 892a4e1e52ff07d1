import { describe, expect, it } from 'vitest';
import { formatLogLine } from './logger';

const TIME = Date.UTC(2024, 0, 2, 3, 4, 5);

describe('formatLogLine', () => {
  it('renders the header and remaining fields', () => {
    const line = formatLogLine(
      { level: 30, time: TIME, msg: 'Listing bucket', module: 'StorageClient', bucket: 'photos' },
      false
    );

    expect(line).toBe('[StorageClient] [INFO] 2024-01-02 03:04:05 Listing bucket\n  {\n    "bucket": "photos"\n  }');
  });

  it('moves error stacks below the payload', () => {
    const line = formatLogLine(
      {
        level: 50,
        time: TIME,
        msg: 'Put failed',
        module: 'StorageClient',
        traceId: 'abc',
        err: { type: 'Error', message: 'boom', stack: 'Error: boom\n    at put' },
      },
      false
    );

    expect(line.split('\n')).toEqual([
      '[StorageClient] [ERROR] 2024-01-02 03:04:05 Put failed',
      '  {',
      '    "err": {',
      '      "type": "Error",',
      '      "message": "boom"',
      '    }',
      '  }',
      '  Error: boom',
      '      at put',
    ]);
  });

  it('falls back for missing module, level and message', () => {
    expect(formatLogLine({ level: 35, time: TIME }, false)).toBe('[App] [INFO] 2024-01-02 03:04:05 (no message)');
  });

  it('colors the header when asked to', () => {
    expect(formatLogLine({ level: 40, time: TIME, msg: 'Slow', module: 'Runtime' }, true)).toBe(
      '\u001b[34m[Runtime]\u001b[0m \u001b[33m[WARN]\u001b[0m \u001b[2m2024-01-02 03:04:05\u001b[0m Slow'
    );
  });
});
