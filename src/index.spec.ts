import * as pkg from './index';

describe('package entry point', () => {
  it('should expose the facade, the resolver and the error types', () => {
    expect(typeof pkg.DualSinkLogger).toBe('function');
    expect(typeof pkg.resolveLogFilePath).toBe('function');
    expect(typeof pkg.createLoggerFromEnv).toBe('function');
    expect(new pkg.InvalidNameError('bad', 'x')).toBeInstanceOf(pkg.LoggerSetupError);
    expect(new pkg.InvalidTypeError('number').code).toBe('INVALID_TYPE');
    expect(pkg.DEFAULT_STEM).toBe('log');
    expect(pkg.DEFAULT_EXT).toBe('.log');
  });

  it('should resolve the default path through the public API', () => {
    const spec = pkg.resolveLogFilePath(undefined, false, { policy: pkg.posixFileNamePolicy });

    expect(spec.path).toBe('log.log');
  });
});
