import { isLogLevel, logger } from '../../src/utils/Logger';

// eslint-disable-next-line no-control-regex
const stripAnsi = (value: string): string => value.replace(/\u001b\[[0-9;]*m/g, '');

describe('Logger', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setLevel('warn');
  });

  afterEach(() => {
    errorSpy.mockRestore();
    logger.setLevel('warn');
  });

  it('should drop messages below the configured level', () => {
    logger.scoped('jvm').info('Using javac from the PATH');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should prefix scoped messages and write them to stderr', () => {
    logger.scoped('jvm').warn('Unable to find javac');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(stripAnsi(String(errorSpy.mock.calls[0][0]))).toMatch(/ \[WARN\] \[JVM\] Unable to find javac$/);
  });

  it('should append metadata', () => {
    logger.setLevel('debug');
    logger.debug('Classified', { rule: 'modern-jdk' });

    expect(stripAnsi(String(errorSpy.mock.calls[0][0]))).toMatch(/\[DEBUG\] Classified \({"rule":"modern-jdk"}\)$/);
  });

  it('should recognize log level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('loud')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
