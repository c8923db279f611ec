import * as path from 'path';
import { InstallationLayout, JvmVendorTag } from '../../types/Jvm';
import { FileSystem } from '../../utils/FileSystem';
import { JavaVersion } from './JavaVersion';

/**
 * The handful of lookups that differ between JVM distributions. Everything else is shared.
 */
export interface VendorBehavior {
  readonly tag: JvmVendorTag;
  readonly ibm: boolean;
  runtimeJar(layout: InstallationLayout, version: JavaVersion): string | undefined;
  toolsJar(layout: InstallationLayout, version: JavaVersion): string | undefined;
  inheritableEnvironment(env: Record<string, string>): Record<string, string>;
}

function firstFile(candidates: string[]): string | undefined {
  return candidates.find(candidate => FileSystem.isFile(candidate));
}

const genericBehavior: VendorBehavior = {
  tag: 'generic',
  ibm: false,
  runtimeJar: (layout, version) => {
    if (version.isJava9Compatible()) {
      return undefined;
    }
    const homes = [layout.suppliedHome, layout.embeddedJreHome].filter(
      (home): home is string => home !== undefined
    );
    return firstFile(homes.map(home => path.join(home, 'lib', 'rt.jar')));
  },
  toolsJar: layout => layout.toolsJarPath,
  inheritableEnvironment: env => ({ ...env }),
};

// Apple's Java 6 kept classes and tools together in ../Classes/classes.jar
function appleClassesJar(layout: InstallationLayout, version: JavaVersion): string | undefined {
  if (version.isJava9Compatible()) {
    return undefined;
  }
  return firstFile([path.join(path.dirname(layout.suppliedHome), 'Classes', 'classes.jar')]);
}

const appleBehavior: VendorBehavior = {
  ...genericBehavior,
  tag: 'apple',
  runtimeJar: (layout, version) =>
    appleClassesJar(layout, version) ?? genericBehavior.runtimeJar(layout, version),
  toolsJar: (layout, version) =>
    appleClassesJar(layout, version) ?? genericBehavior.toolsJar(layout, version),
  inheritableEnvironment: env => {
    const vars: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
      // Set by the Apple launcher for the current process only
      if (/^APP_NAME_\d+$/.test(key) || /^JAVA_MAIN_CLASS_\d+$/.test(key)) {
        continue;
      }
      vars[key] = value;
    }
    return vars;
  },
};

const ibmBehavior: VendorBehavior = {
  ...genericBehavior,
  tag: 'ibm',
  ibm: true,
};

export const VENDOR_BEHAVIORS: Record<JvmVendorTag, VendorBehavior> = {
  generic: genericBehavior,
  apple: appleBehavior,
  ibm: ibmBehavior,
};

export function vendorTagFor(vendor: string): JvmVendorTag {
  const normalized = vendor.toLowerCase();
  if (normalized.includes('apple')) {
    return 'apple';
  }
  if (normalized.includes('ibm')) {
    return 'ibm';
  }
  return 'generic';
}

export function vendorBehaviorFor(vendor: string): VendorBehavior {
  return VENDOR_BEHAVIORS[vendorTagFor(vendor)];
}
