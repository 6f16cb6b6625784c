/** Optional metadata attached to package errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all errors raised by the part model. Preserves prototype chain for instanceof. */
export class DocxError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a part has no outbound relationship of the requested type. */
export class RelationshipNotFoundError extends DocxError {
  constructor(type: string, source: string) {
    super(`no relationship of type '${type}' from '${source}'`, { type, source });
  }
}

/** Thrown when a named style exists but belongs to another style category. */
export class WrongStyleTypeError extends DocxError {
  constructor(styleId: string, actualType: string, expectedType: string) {
    super(`style '${styleId}' is type ${actualType}, need type ${expectedType}`, {
      styleId,
      actualType,
      expectedType,
    });
  }
}

/** Thrown when a style name matches no style in the document. */
export class StyleNotFoundError extends DocxError {
  constructor(name: string) {
    super(`no style with name '${name}'`, { name });
  }
}

/** Thrown when the package graph breaks one of its structural rules. */
export class InvariantViolation extends DocxError {}

/** Thrown when a part's XML cannot be parsed. */
export class XmlParseError extends DocxError {}
