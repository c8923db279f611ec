import * as path from 'path';
import { applyWindowsSiblings, classify } from '../../src/core/jvm/InstallationClassifier';
import { JavaVersion } from '../../src/core/jvm/JavaVersion';
import { InvalidHomeError } from '../../src/core/errors';
import { createTempDir, cleanupTempDir, createTree, FakeOperatingSystem, legacyJdkTree } from '../setup';

describe('InstallationClassifier', () => {
  let tempDir: string;
  const os = new FakeOperatingSystem();
  const java8 = JavaVersion.toVersion('1.8.0_202');
  const java11 = JavaVersion.toVersion('11.0.2');

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('classify', () => {
    it('should reject a missing home before applying any rule', () => {
      expect(() => classify(path.join(tempDir, 'missing'), java8, os)).toThrow(InvalidHomeError);
    });

    it('should walk up from an embedded JRE to its JDK', async () => {
      const jdk = await createTree(path.join(tempDir, 'jdk'), legacyJdkTree());

      expect(classify(path.join(jdk, 'jre'), java8, os)).toEqual({
        kind: 'JdkWithEmbeddedJre',
        suppliedHome: path.join(jdk, 'jre'),
        javaHome: jdk,
        embeddedJreHome: path.join(jdk, 'jre'),
        toolsJarPath: path.join(jdk, 'lib', 'tools.jar'),
      });
    });

    it('should only treat a directory named exactly jre as embedded', async () => {
      const jdk = await createTree(path.join(tempDir, 'jdk'), {
        lib: { 'tools.jar': '' },
        bin: { 'java.exe': '' },
        JRE: { bin: { 'java.exe': '' } },
      });

      const layout = classify(path.join(jdk, 'JRE'), java8, os);

      expect(layout.kind).toBe('StandaloneJre');
      expect(layout.javaHome).toBe(path.join(jdk, 'JRE'));
    });

    it('should classify a JDK without a jre directory as a plain JDK', async () => {
      const jdk = await createTree(path.join(tempDir, 'jdk'), {
        lib: { 'tools.jar': '' },
        bin: { 'java.exe': '', 'javac.exe': '' },
      });

      expect(classify(jdk, java8, os)).toEqual({
        kind: 'Jdk',
        suppliedHome: jdk,
        javaHome: jdk,
        toolsJarPath: path.join(jdk, 'lib', 'tools.jar'),
      });
    });

    it('should never report tools.jar for a standalone JRE', async () => {
      const jre = await createTree(path.join(tempDir, 'jre'), { bin: { 'java.exe': '' } });

      const layout = classify(jre, java8, os);

      expect(layout.kind).toBe('StandaloneJre');
      expect(layout.toolsJarPath).toBeUndefined();
      expect(layout.embeddedJreHome).toBeUndefined();
    });

    it('should ignore residual tools.jar and jre directories from Java 9 on', async () => {
      const jdk = await createTree(path.join(tempDir, 'jdk'), legacyJdkTree());

      expect(classify(jdk, java11, os)).toEqual({
        kind: 'Jdk',
        suppliedHome: jdk,
        javaHome: jdk,
      });
    });

    it('should classify a Java 9+ runtime without javac as a standalone JRE', async () => {
      const jre = await createTree(path.join(tempDir, 'jre-11'), {
        bin: { 'java.exe': '' },
        lib: { modules: '' },
      });

      expect(classify(jre, java11, os).kind).toBe('StandaloneJre');
    });

    it('should recognize a macOS bundle home', async () => {
      const bundle = await createTree(path.join(tempDir, 'jdk-11.jdk'), {
        Contents: { Home: { bin: { java: '' }, lib: {}, conf: {} } },
      });
      const home = path.join(bundle, 'Contents', 'Home');

      expect(classify(home, java11, os)).toEqual({
        kind: 'MacOsBundleJdk',
        suppliedHome: home,
        javaHome: home,
      });
    });

    it('should not treat a bundle home with a jre directory as a macOS bundle', async () => {
      const bundle = await createTree(path.join(tempDir, 'jdk1.8.0.jdk'), {
        Contents: { Home: { bin: { 'java.exe': '' }, lib: {}, conf: {}, jre: {} } },
      });

      expect(classify(path.join(bundle, 'Contents', 'Home'), java8, os).kind).toBe('StandaloneJre');
    });

    it('should apply Windows sibling directories only on Windows', async () => {
      const software = await createTree(path.join(tempDir, 'software'), {
        jre7: { bin: { 'java.exe': '' } },
        'jdk1.7.0': { bin: { 'java.exe': '' }, lib: { 'tools.jar': '' } },
      });
      const version = JavaVersion.toVersion('1.7.0');

      expect(classify(path.join(software, 'jre7'), version, new FakeOperatingSystem(true)).javaHome).toBe(
        path.join(software, 'jdk1.7.0')
      );
      expect(classify(path.join(software, 'jre7'), version, os).javaHome).toBe(
        path.join(software, 'jre7')
      );
    });
  });

  describe('applyWindowsSiblings', () => {
    it('should leave layouts with unrelated directory names untouched', async () => {
      const home = await createTree(path.join(tempDir, 'openjdk'), { bin: { 'java.exe': '' } });
      const layout = { kind: 'StandaloneJre' as const, suppliedHome: home, javaHome: home };

      expect(applyWindowsSiblings(layout, JavaVersion.toVersion('1.6.0'))).toBe(layout);
    });

    it('should record the embedded JRE of the sibling JDK', async () => {
      const software = await createTree(path.join(tempDir, 'software'), {
        jre6: { bin: { 'java.exe': '' } },
        'jdk1.6.0': { lib: { 'tools.jar': '' }, jre: {} },
      });
      const jre = path.join(software, 'jre6');
      const jdk = path.join(software, 'jdk1.6.0');

      expect(
        applyWindowsSiblings(
          { kind: 'StandaloneJre', suppliedHome: jre, javaHome: jre },
          JavaVersion.toVersion('1.6.0')
        )
      ).toEqual({
        kind: 'JdkWithEmbeddedJre',
        suppliedHome: jre,
        javaHome: jdk,
        embeddedJreHome: path.join(jdk, 'jre'),
        toolsJarPath: path.join(jdk, 'lib', 'tools.jar'),
        peerJreHome: jre,
      });
    });
  });
});
