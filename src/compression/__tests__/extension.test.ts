/**
 * Tests for the Extension value
 */

import {AssertionError} from 'assert';
import {Extension} from '../extension';
import {CompressionFormat} from '../types';

const {GZIP, TAR, ZIP, ZSTD} = CompressionFormat;

describe('Extension', () => {
  describe('constructor', () => {
    test('should keep formats and display text', () => {
      const extension = new Extension([TAR, GZIP], 'tgz');
      expect(extension.compressionFormats).toEqual([TAR, GZIP]);
      expect(extension.displayText).toBe('tgz');
    });

    test('should fail fast on an empty format list', () => {
      expect(() => new Extension([], 'broken')).toThrow(AssertionError);
      expect(() => new Extension([], 'broken')).toThrow(
        'Extension "broken" must have at least one compression format'
      );
    });

    test('should freeze a mutable format list', () => {
      const formats = [TAR, ZSTD];
      const extension = new Extension(formats, 'tzst');
      formats.push(GZIP);

      expect(Object.isFrozen(extension.compressionFormats)).toBe(true);
      expect(extension.compressionFormats).toEqual([TAR, ZSTD]);
    });
  });

  describe('isArchive()', () => {
    test('should follow the first format', () => {
      expect(new Extension([TAR, GZIP], 'tgz').isArchive()).toBe(true);
      expect(new Extension([ZIP], 'zip').isArchive()).toBe(true);
      expect(new Extension([GZIP], 'gz').isArchive()).toBe(false);
    });

    test('should ignore archive formats after the first', () => {
      expect(new Extension([GZIP, TAR], 'odd').isArchive()).toBe(false);
    });
  });

  describe('equals()', () => {
    test('should ignore display text', () => {
      const tgz = new Extension([TAR, GZIP], 'tgz');
      const spelled = new Extension([TAR, GZIP], 'tar-gz');
      expect(tgz.equals(spelled)).toBe(true);
      expect(spelled.equals(tgz)).toBe(true);
    });

    test('should respect format order', () => {
      const tarGzip = new Extension([TAR, GZIP], 'tgz');
      const gzipTar = new Extension([GZIP, TAR], 'tgz');
      expect(tarGzip.equals(gzipTar)).toBe(false);
    });

    test('should respect format count', () => {
      const tar = new Extension([TAR], 'tar');
      const tgz = new Extension([TAR, GZIP], 'tar');
      expect(tar.equals(tgz)).toBe(false);
      expect(tgz.equals(tar)).toBe(false);
    });
  });

  describe('key()', () => {
    test('should join formats', () => {
      expect(new Extension([TAR, GZIP], 'tgz').key()).toBe('tar+gzip');
    });

    test('should collapse equal extensions in a Set', () => {
      const keys = new Set(
        [
          new Extension([TAR, GZIP], 'tgz'),
          new Extension([TAR, GZIP], 'tar.gz'),
          new Extension([ZIP], 'zip'),
        ].map(extension => extension.key())
      );
      expect(keys.size).toBe(2);
    });
  });

  test('should iterate over its formats', () => {
    expect([...new Extension([TAR, ZSTD], 'tzst')]).toEqual([TAR, ZSTD]);
  });

  test('should render as its display text', () => {
    expect(`${new Extension([TAR, GZIP], 'tgz')}`).toBe('tgz');
  });
});
