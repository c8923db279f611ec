import * as path from 'path';
import { detectJavaVersion, detectVendor, readReleaseFile } from '../../src/core/jvm/JavaRelease';
import { createTempDir, cleanupTempDir, createTree } from '../setup';

describe('JavaRelease', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should parse quoted and unquoted entries', async () => {
    await createTree(tempDir, {
      release: 'JAVA_VERSION="1.8.0_292"\r\nOS_ARCH=amd64\nIMPLEMENTOR="AdoptOpenJDK"\n# comment\n',
    });

    expect(readReleaseFile(tempDir)).toEqual({
      JAVA_VERSION: '1.8.0_292',
      OS_ARCH: 'amd64',
      IMPLEMENTOR: 'AdoptOpenJDK',
    });
  });

  it('should return null without a release file', () => {
    expect(readReleaseFile(tempDir)).toBeNull();
  });

  describe('detectJavaVersion', () => {
    it('should prefer the release file over the fallback', async () => {
      await createTree(tempDir, { release: 'JAVA_VERSION="17.0.1"\n' });

      expect(detectJavaVersion(tempDir, '1.8')).toBe('17.0.1');
    });

    it('should use the fallback without a release file', () => {
      expect(detectJavaVersion(tempDir, '1.6.0')).toBe('1.6.0');
    });

    it('should guess from lib/modules when nothing else is known', async () => {
      const modular = await createTree(path.join(tempDir, 'modular'), { lib: { modules: '' } });
      const legacy = await createTree(path.join(tempDir, 'legacy'), { lib: { 'rt.jar': '' } });

      expect(detectJavaVersion(modular)).toBe('9');
      expect(detectJavaVersion(legacy)).toBe('1.8');
    });
  });

  describe('detectVendor', () => {
    it('should read IMPLEMENTOR, then the fallback', async () => {
      const withRelease = await createTree(path.join(tempDir, 'a'), { release: 'IMPLEMENTOR="IBM Corporation"' });
      const without = await createTree(path.join(tempDir, 'b'), {});

      expect(detectVendor(withRelease, 'Apple Inc.')).toBe('IBM Corporation');
      expect(detectVendor(without, 'Apple Inc.')).toBe('Apple Inc.');
      expect(detectVendor(without)).toBe('unknown');
    });
  });
});
