/**
 * Structured errors raised by the file backend.
 *
 * Every error carries a stable `code` and a `context` object so callers can
 * report failures as data instead of parsing messages.
 */

export interface ErrorContext {
  operation?: string;
  path?: string;
  [key: string]: unknown;
}

export class EdaFileError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;

  constructor(message: string, code: string, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

export type ParseErrorKind =
  | "unexpected-close"
  | "unclosed-list"
  | "unterminated-string"
  | "empty"
  | "trailing-content";

export class ParseError extends EdaFileError {
  public readonly kind: ParseErrorKind;
  public readonly offset: number;
  public readonly line: number;
  public readonly column: number;

  constructor(kind: ParseErrorKind, offset: number, line: number, column: number, context: ErrorContext = {}) {
    super(`${describeParseError(kind)} at line ${line}, column ${column}`, "PARSE_ERROR", {
      ...context,
      kind,
      offset,
      line,
      column,
    });
    this.kind = kind;
    this.offset = offset;
    this.line = line;
    this.column = column;
  }
}

function describeParseError(kind: ParseErrorKind): string {
  switch (kind) {
    case "unexpected-close":
      return "Unexpected ')'";
    case "unclosed-list":
      return "Unclosed '('";
    case "unterminated-string":
      return "Unterminated string";
    case "empty":
      return "No expression found";
    case "trailing-content":
      return "Unexpected content after the top-level expression";
  }
}

export type NotFoundKind =
  | "file"
  | "symbol"
  | "library"
  | "footprint"
  | "pin"
  | "net"
  | "wire"
  | "label"
  | "junction"
  | "no_connect";

export class NotFoundError extends EdaFileError {
  public readonly kind: NotFoundKind;
  public readonly identifier: string;

  constructor(kind: NotFoundKind, identifier: string, context: ErrorContext = {}) {
    super(`${kind} not found: ${identifier}`, "NOT_FOUND", { ...context, kind, identifier });
    this.kind = kind;
    this.identifier = identifier;
  }
}

export class AmbiguousConnectivityError extends EdaFileError {
  public readonly names: string[];

  constructor(names: string[], context: ErrorContext = {}) {
    super(`Conflicting net names on one connected group: ${names.join(", ")}`, "AMBIGUOUS_CONNECTIVITY", {
      ...context,
      names,
    });
    this.names = names;
  }
}

export class InheritanceDepthExceededError extends EdaFileError {
  public readonly chain: string[];

  constructor(chain: string[], reason: "depth" | "cycle", context: ErrorContext = {}) {
    const detail = reason === "cycle" ? "cycle detected" : "depth limit exceeded";
    super(`Symbol inheritance ${detail}: ${chain.join(" -> ")}`, "INHERITANCE_DEPTH_EXCEEDED", {
      ...context,
      chain,
      reason,
    });
    this.chain = chain;
  }
}

export class GeometryUnresolvedError extends EdaFileError {
  constructor(libraryId: string, context: ErrorContext = {}) {
    super(`No pin geometry found for ${libraryId}`, "GEOMETRY_UNRESOLVED", { ...context, libraryId });
  }
}

export class StructuralInvariantViolationError extends EdaFileError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, "STRUCTURAL_INVARIANT_VIOLATION", context);
  }
}

export class IOConflictError extends EdaFileError {
  constructor(path: string, context: ErrorContext = {}) {
    super(`File changed on disk since it was read: ${path}`, "IO_CONFLICT", { ...context, path });
  }
}

export class DocumentExistsError extends EdaFileError {
  constructor(path: string, context: ErrorContext = {}) {
    super(`Refusing to overwrite existing file: ${path}`, "DOCUMENT_EXISTS", { ...context, path });
  }
}

export class ValidationError extends EdaFileError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, "VALIDATION_ERROR", context);
  }
}
