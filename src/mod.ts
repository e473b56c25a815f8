// Public entry point.
export { AkomaNtosoDocument, type SerializeOptions, type XmlEncoding } from "./core/domain/akn/document.ts";
export {
  StructuredDocument,
  type DocumentKind,
  type SkeletonAttributes,
} from "./core/domain/akn/structured_document.ts";
export { registerDocumentType, lookupDocumentType, listDocumentTypes } from "./core/domain/akn/registry.ts";
export * from "./core/domain/akn/types/index.ts";
export { FrbrUri, type FrbrUriCoords } from "./core/domain/frbr_uri.ts";
export { parseDate, formatDate, today, type PlainDate, type DateInput } from "./core/domain/dates.ts";
export {
  AKN_NAMESPACES,
  DEFAULT_VERSION,
  resolveNamespace,
  isAknVersion,
  versionOf,
  type AknVersion,
  type NamespaceTable,
} from "./core/domain/parse/namespaces.ts";
export type { XmlInput } from "./core/domain/parse/xast_xml.ts";
export { AknError, ValidationError, ElementNotFoundError, ConfigError } from "./core/shared/errors.ts";
export {
  resolveConfig,
  DEFAULT_SOURCE,
  type DocumentConfig,
  type DocumentOptions,
  type Source,
} from "./core/shared/config.ts";
export { logger } from "./core/shared/logger.ts";
