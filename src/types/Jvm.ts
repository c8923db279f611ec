// src/types/Jvm.ts - Installation layout and JVM description types
export type InstallationKind = 'StandaloneJre' | 'Jdk' | 'JdkWithEmbeddedJre' | 'MacOsBundleJdk';

export type JvmVendorTag = 'generic' | 'apple' | 'ibm';

export interface InstallationLayout {
  readonly kind: InstallationKind;
  /** The directory the classifier was handed, before any walking up or sibling redirection. */
  readonly suppliedHome: string;
  readonly javaHome: string;
  readonly embeddedJreHome?: string;
  /** Sibling standalone JRE found through the Windows versioned-directory naming. */
  readonly peerJreHome?: string;
  readonly toolsJarPath?: string;
}

/**
 * The reported identity of a running JVM, as `java.home`, `java.version` and `java.vm.vendor`.
 */
export interface JavaProperties {
  javaHome: string;
  javaVersion: string;
  vendor: string;
}

/**
 * A runtime directory exposed without the rest of the JVM model.
 */
export interface JavaInfo {
  readonly homeDir: string;
}

export interface JvmDescription {
  javaHome: string;
  kind: InstallationKind;
  vendor: JvmVendorTag;
  javaVersion: string;
  javaExecutable: string;
  javacExecutable: string;
  javadocExecutable: string;
  toolsJar?: string;
  runtimeJar?: string;
  jre?: string;
  standaloneJre?: string;
}
