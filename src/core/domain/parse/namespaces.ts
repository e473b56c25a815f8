// namespaces.ts
// Known Akoma Ntoso namespaces and detection of the one a document uses.

import { ValidationError } from "../../shared/errors.ts";

export const AKN_NAMESPACES = Object.freeze({
  "2.0": "http://www.akomantoso.org/2.0",
  "3.0": "http://docs.oasis-open.org/legaldocml/ns/akn/3.0",
} as const);

export type AknVersion = keyof typeof AKN_NAMESPACES;
export type NamespaceTable = Readonly<Record<string, string>>;

export const DEFAULT_VERSION: AknVersion = "3.0";

export function isAknVersion(value: string): value is AknVersion {
  return Object.hasOwn(AKN_NAMESPACES, value);
}

/** Version labels compared numerically, so "10.0" sorts above "3.0". */
function compareVersions(a: string, b: string): number {
  const pa = a.split(".").map(Number);
  const pb = b.split(".").map(Number);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const d = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (d !== 0) return d;
  }
  return 0;
}

/**
 * Pick the namespace of the highest known version present in `declared`.
 * Throws ValidationError naming the known and the declared namespaces when none match.
 */
export function resolveNamespace(declared: readonly string[], table: NamespaceTable = AKN_NAMESPACES): string {
  const known = Object.keys(table)
    .sort((a, b) => compareVersions(b, a))
    .map((version) => table[version])
    .filter((ns): ns is string => ns !== undefined);

  const hit = known.find((ns) => declared.includes(ns));
  if (hit) return hit;

  throw new ValidationError(
    `Expected to find one of the following Akoma Ntoso XML namespaces: ${known.join(", ")}. ` +
      `Only these namespaces were found: ${declared.join(", ")}`,
    { expected: known, actual: [...declared] },
  );
}

/** The version label for a namespace URI, if it is a known one. */
export function versionOf(namespace: string, table: NamespaceTable = AKN_NAMESPACES): string | undefined {
  return Object.keys(table).find((version) => table[version] === namespace);
}
