// errors.ts
// Error hierarchy for the document model. Nothing here is retried or logged;
// callers decide whether a failure is recoverable.

/** Base class for every error raised by this package. */
export class AknError extends Error {
  public readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
  }
}

/**
 * Markup that parsed but does not have the shape of an Akoma Ntoso document,
 * or a URI/date that cannot be parsed.
 */
export class ValidationError extends AknError {}

/** A required element is missing from the tree. */
export class ElementNotFoundError extends AknError {
  constructor(public readonly path: string, within?: string) {
    super(within ? `Element ${path} not found in <${within}>` : `Element ${path} not found`, { path, within });
  }
}

/** Invalid document options. */
export class ConfigError extends AknError {}
