/* packages/core/test/logger.spec.ts */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger } from '../src/index.js';

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes the tag', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    consoleLogger('scan').info({ rows: 3 }, 'scan-done');
    expect(info).toHaveBeenCalledWith('[scan]', 'scan-done', { rows: 3 });
  });

  it('drops debug output unless enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    consoleLogger().debug({}, 'quiet');
    expect(debug).not.toHaveBeenCalled();
    consoleLogger('docbridge', { debug: true }).debug({ n: 1 }, 'loud');
    expect(debug).toHaveBeenCalledWith('[docbridge]', 'loud', { n: 1 });
  });
});
