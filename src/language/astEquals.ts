/**
 * Structural equality of two syntax trees. `loc` is ignored, and a property
 * holding `undefined` is treated as absent, so a tree built by hand compares
 * equal to the parsed one.
 */
export function astEquals(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }

  if (Array.isArray(a)) {
    return (
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((item, index) => astEquals(item, b[index]))
    );
  }

  if (!isObjectLike(a) || !isObjectLike(b) || Array.isArray(b)) {
    return false;
  }

  const aKeys = significantKeys(a);
  const bKeys = significantKeys(b);
  if (aKeys.length !== bKeys.length) {
    return false;
  }

  return aKeys.every(
    (key) => Object.hasOwn(b, key) && astEquals(a[key], b[key]),
  );
}

function isObjectLike(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null;
}

function significantKeys(node: { [key: string]: unknown }): Array<string> {
  return Object.keys(node).filter(
    (key) => key !== 'loc' && node[key] !== undefined,
  );
}
