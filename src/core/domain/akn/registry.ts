// registry.ts
// Document type lookup. Each document type module registers its class when
// it is loaded; the first class registered for a name wins.
import type { DocumentKind } from "./structured_document.ts";

const registry = new Map<string, DocumentKind>();

export function registerDocumentType<K extends DocumentKind>(kind: K): K {
  const key = kind.documentType.toLowerCase();
  if (key && !registry.has(key)) registry.set(key, kind);
  return kind;
}

/** Case-insensitive lookup of a registered document type. */
export function lookupDocumentType(documentType: string): DocumentKind | undefined {
  return registry.get(documentType.toLowerCase());
}

/** Registered document type names, in registration order. */
export function listDocumentTypes(): string[] {
  return [...registry.values()].map((k) => k.documentType);
}
