import { InvalidNameError } from './errors';
import { policyForPlatform, posixFileNamePolicy, windowsFileNamePolicy } from './fileNamePolicy';

describe('policyForPlatform', () => {
  it('should pick the Windows rules only on win32', () => {
    expect(policyForPlatform('win32')).toBe(windowsFileNamePolicy);
    expect(policyForPlatform('linux')).toBe(posixFileNamePolicy);
    expect(policyForPlatform('darwin')).toBe(posixFileNamePolicy);
  });
});

describe('windowsFileNamePolicy', () => {
  const validate = (name: string) => () => windowsFileNamePolicy.validate(name);

  it.each(['CON', 'prn.log', 'Aux.txt', 'nul', 'COM1.log', 'com9', 'LPT1', 'lpt9.out'])(
    'should reject the device name %s',
    (name) => {
      expect(validate(name)).toThrow(InvalidNameError);
    }
  );

  it('should reject a device name in a directory segment', () => {
    expect(validate('logs/con/app.log')).toThrow('reserved Windows device name: con');
  });

  it('should allow names that only start like a device name', () => {
    expect(validate('console.log')).not.toThrow();
    expect(validate('null/auxiliary.log')).not.toThrow();
    expect(validate('COM10.log')).not.toThrow();
    expect(validate('aux.log.txt')).not.toThrow();
  });

  it.each(['a<b.log', 'a>b.log', 'app:b.log', 'a"b.log', 'a|b.log', 'a?b.log', 'a*b.log'])(
    'should reject reserved characters in %s',
    (name) => {
      expect(validate(name)).toThrow('invalid characters for Windows paths');
    }
  );

  it('should treat both slashes as separators', () => {
    expect(validate('logs/app.log')).not.toThrow();
    expect(validate('logs\\nested\\app.log')).not.toThrow();
  });

  it('should skip drive and UNC roots', () => {
    expect(validate('C:\\logs\\app.log')).not.toThrow();
    expect(validate('\\\\server\\share\\app.log')).not.toThrow();
  });

  it('should still reject a colon after the root', () => {
    expect(validate('C:\\logs\\a:b.log')).toThrow(InvalidNameError);
  });
});

describe('posixFileNamePolicy', () => {
  it('should accept characters Windows forbids', () => {
    expect(() => posixFileNamePolicy.validate('inva|id:log*name?.log')).not.toThrow();
    expect(() => posixFileNamePolicy.validate('aux.log')).not.toThrow();
  });
});
