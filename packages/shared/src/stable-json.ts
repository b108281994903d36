function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!value || typeof value !== 'object') {
    return false;
  }

  return Object.getPrototypeOf(value) === Object.prototype;
}

function normalizeValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalizeValue(item));
  }

  if (isPlainObject(value)) {
    return Object.keys(value)
      .sort((left, right) => left.localeCompare(right))
      .reduce<Record<string, unknown>>((accumulator, key) => {
        const nextValue = value[key];
        if (nextValue === undefined) {
          return accumulator;
        }

        accumulator[key] = normalizeValue(nextValue);
        return accumulator;
      }, {});
  }

  return value;
}

/** JSON.stringify with object keys sorted at every depth. */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalizeValue(value));
}
