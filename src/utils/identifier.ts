/** Separator used between a module name and its version in manifests */
export const PATH_SEPARATOR = '/';

const DIGIT_PATTERN = /[0-9]/;

/**
 * Checks whether a name carries a version token
 * @param name - Module or package name
 * @returns True if the name contains at least one digit
 */
export function hasVersionToken(name: string): boolean {
  return DIGIT_PATTERN.test(name);
}

/**
 * Normalizes a module name into an identifier by replacing every
 * path separator with a hyphen
 *
 * @example
 * normalizeIdentifier('GCC/11.2.0')
 * // Returns: 'GCC-11.2.0'
 */
export function normalizeIdentifier(name: string): string {
  return name.split(PATH_SEPARATOR).join('-');
}

/**
 * Strips a known extension from a file name
 * @param fileName - Base name of the file
 * @param extension - Extension including the leading dot (e.g. '.eb')
 * @returns The stem, or null if the name does not end with the extension
 */
export function stripExtension(fileName: string, extension: string): string | null {
  if (!fileName.endsWith(extension)) {
    return null;
  }
  return fileName.slice(0, fileName.length - extension.length);
}
