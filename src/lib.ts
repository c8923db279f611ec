export { Jvm, ForHomeOptions } from './core/jvm/Jvm';
export { JavaVersion } from './core/jvm/JavaVersion';
export { classify, applyWindowsSiblings, LAYOUT_RULES } from './core/jvm/InstallationClassifier';
export { VENDOR_BEHAVIORS, VendorBehavior, vendorBehaviorFor, vendorTagFor } from './core/jvm/JvmVendor';
export { JavaPropertiesProbe } from './core/jvm/JavaPropertiesProbe';
export { detectJavaVersion, detectVendor, readReleaseFile } from './core/jvm/JavaRelease';
export {
  OperatingSystem,
  WindowsOperatingSystem,
  UnixOperatingSystem,
  MacOsOperatingSystem,
  currentOperatingSystem,
  operatingSystemFor,
} from './core/os/OperatingSystem';
export { SystemProperties, JavaPropertyKey } from './core/SystemProperties';
export { ConfigManager } from './core/ConfigManager';
export { JvmError, JvmErrorCode, InvalidHomeError, JavaHomeError } from './core/errors';
export * from './types/Jvm';
export * from './types/Config';
