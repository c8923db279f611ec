import { InvalidHomeError, JavaHomeError, JvmError, JvmErrorCode } from '../../src/core/errors';

describe('errors', () => {
  it('should describe an invalid home with the supplied path', () => {
    const err = new InvalidHomeError('i dont exist');

    expect(err.code).toBe(JvmErrorCode.INVALID_HOME);
    expect(err.message).toBe('Supplied javaHome must be a valid directory. You supplied: i dont exist');
    expect(err.context).toEqual({ javaHome: 'i dont exist' });
    expect(err).toBeInstanceOf(JvmError);
    expect(err).not.toBeInstanceOf(JavaHomeError);
  });

  it('should name the executable and the home when an executable is missing', () => {
    const err = JavaHomeError.missingExecutable('javac', '/opt/jdk', '/opt/jdk/bin/javac');

    expect(err.code).toBe(JvmErrorCode.JAVA_HOME_INVALID);
    expect(err.name).toBe('JavaHomeError');
    expect(err.message).toBe(
      'The supplied javaHome seems to be invalid. I cannot find the javac executable. ' +
        'Tried location: /opt/jdk/bin/javac (javaHome: /opt/jdk)'
    );
    expect(err.context).toEqual({
      executable: 'javac',
      javaHome: '/opt/jdk',
      triedLocation: '/opt/jdk/bin/javac',
    });
  });
});
