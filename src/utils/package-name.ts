import { ValidationError } from './errors.js';

/**
 * Package and library names become file and directory names
 * (`gems/<name>-<version>`, `<sitelibdir>/<autorequire>.js`), so they are
 * restricted to a portable character set.
 */
export const PACKAGE_NAME_REGEX = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Validate package name according to naming rules.
 *
 * @param name - The package name to validate
 * @throws ValidationError if the name is invalid
 */
export function validatePackageName(name: string, label: string = 'Package name'): void {
  if (name.length === 0) {
    throw new ValidationError(`${label} cannot be empty`);
  }

  if (name.length > 214) {
    throw new ValidationError(`${label} '${name}' is too long (max 214 characters)`);
  }

  if (!PACKAGE_NAME_REGEX.test(name)) {
    throw new ValidationError(
      `${label} '${name}' contains invalid characters. ` +
      `Use letters, digits, '.', '_' or '-', starting with a letter or digit.`
    );
  }
}
