/**
 * Version parsing used to order sub-toolset names
 */

/** Two to four numeric components */
export type Version = readonly number[];

const VERSION_PATTERN = /^[vV]?(\d+(?:\.\d+){0,3})$/;

/**
 * Parse "12.0", "v12.0" or "12" (read as 12.0). Anything else is undefined.
 */
export function convertToVersion(text: string): Version | undefined {
  const match = VERSION_PATTERN.exec(text.trim());
  const digits = match?.[1];
  if (!digits) return undefined;

  const components = digits.split('.').map((part) => Number.parseInt(part, 10));
  return components.length === 1 ? [...components, 0] : components;
}

/**
 * Component-wise order; a missing component sorts before any present one
 */
export function compareVersions(a: Version, b: Version): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? -1;
    const right = b[i] ?? -1;
    if (left !== right) return left - right;
  }
  return 0;
}

export function versionsEqual(a: Version, b: Version): boolean {
  return a.length === b.length && compareVersions(a, b) === 0;
}
