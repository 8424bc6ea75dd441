import type { Grid } from './haystack/value.js';

/**
 * Base class for every error raised by the Haystack client
 */
export class HaystackError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A domain value could not be constructed because an invariant was violated
 */
export class ValueError extends HaystackError {
  constructor(
    message: string,
    public readonly constraint: string,
  ) {
    super(message);
  }
}

export type ParseFormat = 'zinc' | 'hayson';

export type ParseErrorKind = 'Syntax' | 'UnknownKind' | 'Shape' | 'Value';

export interface ParsePosition {
  line?: number;
  column?: number;
  /** JSON path of the offending node, e.g. `rows[2].curVal` */
  path?: string;
}

/**
 * Malformed Zinc or Hayson text. Position is 1-based for Zinc.
 */
export class ParseError extends HaystackError {
  public readonly line?: number;
  public readonly column?: number;
  public readonly path?: string;

  constructor(
    public readonly format: ParseFormat,
    public readonly kind: ParseErrorKind,
    public readonly detail: string,
    position: ParsePosition = {},
    options?: ErrorOptions,
  ) {
    super(`${format} ${kind.toLowerCase()} error${describePosition(position)}: ${detail}`, options);
    this.line = position.line;
    this.column = position.column;
    this.path = position.path;
  }
}

function describePosition(position: ParsePosition): string {
  if (position.line !== undefined) {
    return ` at line ${position.line}, column ${position.column ?? 0}`;
  }
  if (position.path !== undefined) {
    return ` at ${position.path || '$'}`;
  }
  return '';
}

export type AuthFailureReason =
  | 'UnsupportedMechanism'
  | 'ServerSignatureMismatch'
  | 'MalformedMessage'
  | 'Rejected'
  | 'Transport';

export type AuthPhase = 'init' | 'helloSent' | 'firstSent' | 'authenticated';

/**
 * The SCRAM handshake failed
 */
export class AuthError extends HaystackError {
  constructor(
    message: string,
    public readonly reason: AuthFailureReason,
    public readonly phase: AuthPhase,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/**
 * The server rejected a freshly issued token as well as the previous one
 */
export class AuthExpiredError extends HaystackError {
  constructor(public readonly op: string) {
    super(`Authentication expired for ${op}: token rejected twice`);
  }
}

export interface OpErrorDetails {
  status?: number;
  errType?: string;
  trace?: string;
  grid?: Grid;
}

/**
 * The server reported a failed operation, or the response broke the op's contract
 */
export class OpError extends HaystackError {
  public readonly status?: number;
  public readonly errType?: string;
  public readonly trace?: string;
  public readonly grid?: Grid;

  constructor(
    public readonly op: string,
    message: string,
    details: OpErrorDetails = {},
  ) {
    super(message);
    this.status = details.status;
    this.errType = details.errType;
    this.trace = details.trace;
    this.grid = details.grid;
  }
}

/**
 * Network or I/O failure below the HTTP layer
 */
export class TransportError extends HaystackError {
  constructor(
    message: string,
    public readonly url: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}
