import {
  ValidationError,
  collectValidationErrors,
  normalizeEmail,
  sanitizeString,
  validateEmail,
  validatePhone,
  validateRequired,
} from '../../src/utils/validators';

describe('validators', () => {
  it('should accept plausible emails only', () => {
    expect(validateEmail('alice@example.com')).toBe(true);
    expect(validateEmail('alice@example')).toBe(false);
    expect(validateEmail('alice example@example.com')).toBe(false);
  });

  it('should accept both phone formats', () => {
    expect(validatePhone('+1234567890')).toBe(true);
    expect(validatePhone('123-456-7890')).toBe(true);
    expect(validatePhone('1234567890')).toBe(false);
    expect(validatePhone('+12 34')).toBe(false);
  });

  it('should name the missing field', () => {
    expect(() => validateRequired({ name: '' }, ['name'])).toThrow('Missing required field: name');
  });

  it('should collect validation messages and rethrow anything else', () => {
    expect(
      collectValidationErrors([
        () => {
          throw new ValidationError('first');
        },
        () => undefined,
        () => {
          throw new ValidationError('second');
        },
      ])
    ).toEqual(['first', 'second']);

    expect(() =>
      collectValidationErrors([
        () => {
          throw new TypeError('boom');
        },
      ])
    ).toThrow(TypeError);
  });

  it('should strip control characters and collapse whitespace', () => {
    expect(sanitizeString('  Alice\u0007   Example  ')).toBe('Alice Example');
    expect(normalizeEmail(' Alice@Example.COM ')).toBe('alice@example.com');
  });
});
