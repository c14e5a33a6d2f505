/**
 * Feed attribute name paired with the record key it is copied to.
 */
export type FieldPair<K extends string> = readonly [from: string, to: K];

export type AttributeSource = Readonly<Record<string, string | undefined>>;

/**
 * Own attributes only; prototype members such as `toString` never match.
 */
export function readAttribute(source: AttributeSource, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(source, key) ? source[key] : undefined;
}

/**
 * Copy every listed attribute that exists in `source` into `sink` under its
 * new name. Missing attributes are skipped and entries already in `sink` that
 * no pair touches are left alone.
 */
export function transferFields<K extends string>(
  pairs: ReadonlyArray<FieldPair<K>>,
  source: AttributeSource,
  sink: Partial<Record<K, string>> = {},
): Partial<Record<K, string>> {
  for (const [from, to] of pairs) {
    const value = readAttribute(source, from);
    if (value !== undefined) {
      sink[to] = value;
    }
  }
  return sink;
}
