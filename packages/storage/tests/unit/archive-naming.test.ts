import { describe, it, expect } from 'vitest';
import {
  buildArchiveName,
  formatArchiveTimestamp,
  parseArchiveName,
} from '../../src/artifacts/archive-naming.js';

const AT = Date.UTC(2024, 2, 5, 7, 8, 9, 450);

describe('archive naming', () => {
  it('should format timestamps to the second', () => {
    expect(formatArchiveTimestamp(AT, 'utc')).toBe('20240305_070809');
  });

  it('should build the default name', () => {
    expect(buildArchiveName({ timestampMs: AT, iteration: 1, zone: 'utc' })).toBe(
      'clover_data_20240305_070809_01.tar.gz'
    );
  });

  it('should honour prefix and plan width', () => {
    expect(
      buildArchiveName({ timestampMs: AT, iteration: 3, total: 150, prefix: 'sweep', zone: 'utc' })
    ).toBe('sweep_20240305_070809_003.tar.gz');
  });

  it('should keep iterations in the same second apart', () => {
    const names = [1, 2, 3].map((iteration) =>
      buildArchiveName({ timestampMs: AT, iteration, total: 3, zone: 'utc' })
    );
    expect(new Set(names).size).toBe(3);
  });

  it('should parse a name back into its parts', () => {
    expect(parseArchiveName('my_prefix_20240305_070809_012.tar.gz')).toEqual({
      prefix: 'my_prefix',
      timestamp: '20240305_070809',
      iteration: 12,
    });
  });

  it('should return null for names it did not build', () => {
    expect(parseArchiveName('clover_data_01.tar.gz')).toBeNull();
    expect(parseArchiveName('clover_data_20240305_070809_01.zip')).toBeNull();
  });
});
