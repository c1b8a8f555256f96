import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadAppConfig } from '../config.ts';

describe('loadAppConfig', () => {
  it('applies defaults', () => {
    const result = loadAppConfig({}, '/srv/tallyview');

    expect(result._unsafeUnwrap()).toEqual({
      dataFile: path.resolve('/srv/tallyview', 'data', 'transactions.csv'),
      nodeEnv: 'development',
      port: 8000,
      progressInterval: 10_000,
    });
  });

  it('reads overrides from the environment', () => {
    const result = loadAppConfig(
      {
        NODE_ENV: 'production',
        TALLYVIEW_API_PORT: '9100',
        TALLYVIEW_DATA_FILE: '/var/data/tx.csv',
        TALLYVIEW_LOAD_PROGRESS_INTERVAL: '500',
      },
      '/srv/tallyview'
    );

    expect(result._unsafeUnwrap()).toEqual({
      dataFile: '/var/data/tx.csv',
      nodeEnv: 'production',
      port: 9100,
      progressInterval: 500,
    });
  });

  it('lists every invalid variable', () => {
    const result = loadAppConfig({ TALLYVIEW_API_PORT: 'eighty', TALLYVIEW_LOAD_PROGRESS_INTERVAL: '0' });

    expect(result.isErr()).toBe(true);
    const message = result._unsafeUnwrapErr().message;
    expect(message).toContain('Environment validation failed:');
    expect(message).toContain('  - TALLYVIEW_API_PORT:');
    expect(message).toContain('  - TALLYVIEW_LOAD_PROGRESS_INTERVAL:');
  });
});
