import { ConfigError } from './errors';
import { isSeverity, moreVerbose, parseSeverity } from './levels';

describe('parseSeverity', () => {
  it('should accept names in any case', () => {
    expect(parseSeverity('debug', 'level')).toBe('debug');
    expect(parseSeverity('INFO', 'level')).toBe('info');
    expect(parseSeverity(' Warning ', 'level')).toBe('warning');
  });

  it('should map aliases', () => {
    expect(parseSeverity('warn', 'level')).toBe('warning');
    expect(parseSeverity('FATAL', 'level')).toBe('critical');
  });

  it('should map numeric levels', () => {
    expect(parseSeverity(10, 'level')).toBe('debug');
    expect(parseSeverity(20, 'level')).toBe('info');
    expect(parseSeverity(30, 'level')).toBe('warning');
    expect(parseSeverity('40', 'level')).toBe('error');
    expect(parseSeverity(50, 'level')).toBe('critical');
  });

  it('should reject anything else with the option name', () => {
    expect(() => parseSeverity('verbose', 'consoleLevel')).toThrow(ConfigError);
    expect(() => parseSeverity(25, 'fileLevel')).toThrow("'fileLevel' must be one of");
    expect(() => parseSeverity(undefined, 'x')).toThrow(ConfigError);
  });
});

describe('moreVerbose', () => {
  it('should return the level that lets more through', () => {
    expect(moreVerbose('info', 'debug')).toBe('debug');
    expect(moreVerbose('debug', 'info')).toBe('debug');
    expect(moreVerbose('critical', 'warning')).toBe('warning');
    expect(moreVerbose('error', 'error')).toBe('error');
  });
});

describe('isSeverity', () => {
  it('should only accept canonical names', () => {
    expect(isSeverity('critical')).toBe(true);
    expect(isSeverity('warn')).toBe(false);
    expect(isSeverity('toString')).toBe(false);
  });
});
