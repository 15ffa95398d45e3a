import canonicalizeLib from 'canonicalize';

export function canonicalize(value: unknown): string {
  const json = canonicalizeLib(value);
  if (json === undefined) {
    throw new TypeError(`Value of type ${typeof value} has no canonical JSON form`);
  }
  return json;
}
