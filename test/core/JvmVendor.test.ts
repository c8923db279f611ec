import { VENDOR_BEHAVIORS, vendorTagFor } from '../../src/core/jvm/JvmVendor';

describe('JvmVendor', () => {
  describe('vendorTagFor', () => {
    it.each([
      ['Apple Inc.', 'apple'],
      ['apple computer, inc.', 'apple'],
      ['IBM Corporation', 'ibm'],
      ['Eclipse OpenJ9 (IBM)', 'ibm'],
      ['Sun Microsystems Inc.', 'generic'],
      ['Eclipse Adoptium', 'generic'],
      ['', 'generic'],
    ])('should map %p to %s', (vendor, tag) => {
      expect(vendorTagFor(vendor)).toBe(tag);
    });
  });

  describe('inheritableEnvironment', () => {
    const env = {
      PATH: '/usr/bin',
      APP_NAME_1234: 'Launcher',
      JAVA_MAIN_CLASS_1234: 'org.example.Main',
      JAVA_MAIN_CLASS: 'kept',
    };

    it('should drop Apple launcher variables on Apple JVMs', () => {
      expect(VENDOR_BEHAVIORS.apple.inheritableEnvironment(env)).toEqual({
        PATH: '/usr/bin',
        JAVA_MAIN_CLASS: 'kept',
      });
    });

    it('should pass everything through on other JVMs', () => {
      expect(VENDOR_BEHAVIORS.generic.inheritableEnvironment(env)).toEqual(env);
      expect(VENDOR_BEHAVIORS.ibm.inheritableEnvironment(env)).toEqual(env);
    });
  });

  describe('ibm', () => {
    it('should only be set for the IBM variant', () => {
      expect(VENDOR_BEHAVIORS.ibm.ibm).toBe(true);
      expect(VENDOR_BEHAVIORS.apple.ibm).toBe(false);
      expect(VENDOR_BEHAVIORS.generic.ibm).toBe(false);
    });
  });
});
