import { describe, it, expect, afterEach } from 'vitest';
import { getEnvDiagnostics } from './env.js';
import { resolveDataDir } from './paths.js';

describe('env diagnostics', () => {
  afterEach(() => {
    delete process.env.TEST_DATA_DIR;
    delete process.env.TEST_LEVEL;
  });

  it('reports values of present keys and flags missing ones', () => {
    process.env.TEST_DATA_DIR = '/srv/exclusion';

    const diagnostics = getEnvDiagnostics(['TEST_DATA_DIR', 'TEST_MISSING']);
    const byKey = Object.fromEntries(diagnostics.keys.map((k) => [k.key, k]));

    expect(byKey.TEST_DATA_DIR).toMatchObject({ present: true, value: '/srv/exclusion', length: 14 });
    expect(byKey.TEST_MISSING).toEqual({ key: 'TEST_MISSING', present: false });
  });

  it('warns about quoted values and control characters', () => {
    process.env.TEST_DATA_DIR = '"/srv/exclusion"';
    process.env.TEST_LEVEL = 'debug\r';
    const diagnostics = getEnvDiagnostics(['TEST_DATA_DIR', 'TEST_LEVEL']);
    expect(diagnostics.warnings).toContain(
      'TEST_DATA_DIR contains quotes or leading/trailing whitespace (may cause issues)'
    );
    expect(diagnostics.warnings).toContain(
      'TEST_LEVEL contains unprintable characters (possible CRLF/encoding issue)'
    );
  });
});

describe('resolveDataDir', () => {
  it('prefers EXCLUSION_DATA_DIR', () => {
    expect(resolveDataDir({ EXCLUSION_DATA_DIR: '/srv/exclusion' })).toBe('/srv/exclusion');
  });
});
