import path from 'path';

/**
 * Splits a file name at its last dot. A leading dot marks a hidden file and
 * is never treated as the extension separator, so `.bashrc` has no extension.
 */
export const splitStemAndExtension = (name: string) => {
  const lastDot = name.lastIndexOf('.');
  if (lastDot <= 0) {
    return { stem: name, extension: '' };
  }
  return { stem: name.slice(0, lastDot), extension: name.slice(lastDot) };
};

const replaceAll = (value: string, characters: ReadonlySet<string>, substitute: string) =>
  Array.from(value, (char) => (characters.has(char) ? substitute : char)).join('');

/**
 * Replaces every troublesome character in `name` with `substitute`. The dot
 * that separates the extension and the dot that hides a file survive even
 * when `.` itself is configured as troublesome.
 */
export const sanitizeName = (
  name: string,
  troublesome: readonly string[],
  substitute: string,
): string => {
  const characters = new Set(troublesome);
  const hidden = name.startsWith('.') ? '.' : '';
  const { stem, extension } = splitStemAndExtension(name.slice(hidden.length));
  const cleanStem = replaceAll(stem, characters, substitute);
  const cleanExtension = extension
    ? `.${replaceAll(extension.slice(1), characters, substitute)}`
    : '';
  return `${hidden}${cleanStem}${cleanExtension}`;
};

/** `report.txt` with counter 2 and separator `_` becomes `report_2.txt`. */
export const withCounter = (name: string, counter: number, separator: string) => {
  const hidden = name.startsWith('.') ? '.' : '';
  const { stem, extension } = splitStemAndExtension(name.slice(hidden.length));
  return `${hidden}${stem}${separator}${counter}${extension}`;
};

/** Returns the first configured suffix the name ends with (case-sensitive). */
export const matchSuffix = (name: string, suffixes: readonly string[]) =>
  suffixes.find((suffix) => suffix.length > 0 && name.endsWith(suffix));

export const isSameOrInside = (parent: string, candidate: string) => {
  const relative = path.relative(parent, candidate);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
};

/** Plain code-unit ordering, independent of locale. */
export const comparePaths = (a: string, b: string) => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};
