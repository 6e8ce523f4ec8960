import { errorCode, errorMessage } from '../utils/errors.util';

describe('Error helpers', () => {
  test('should read message and code from an Error', () => {
    const error = Object.assign(new Error('denied'), { code: 'EACCES' });
    expect(errorMessage(error)).toBe('denied');
    expect(errorCode(error)).toBe('EACCES');
  });

  test('should read message and code from an error-shaped object of another realm', () => {
    const foreign = { name: 'Error', message: "ENOENT: no such file or directory, stat '/missing'", code: 'ENOENT' };
    expect(errorMessage(foreign)).toBe("ENOENT: no such file or directory, stat '/missing'");
    expect(errorCode(foreign)).toBe('ENOENT');
  });

  test('should fall back for values that are not errors', () => {
    expect(errorMessage('boom')).toBe('Unknown error');
    expect(errorMessage(null)).toBe('Unknown error');
    expect(errorCode({ code: 2 })).toBeUndefined();
    expect(errorCode(undefined)).toBeUndefined();
  });
});
