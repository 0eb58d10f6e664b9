/**
 * SurrogateError - Composable error system with facets and boundaries.
 *
 * Errors are composed from facets (marker traits and data traits) instead of
 * class inheritance. Three discrimination axes: exact type (code), facet, domain.
 *
 * Two wrapping mechanisms:
 * - ErrorDef.wrap(fn) — intent wrap: "if this fails, the error is X"
 * - Boundary.wrap(data, fn) — domain entry: "you're entering this boundary with this context"
 *
 * Errors cross process boundaries as SerializedError and come back through
 * SurrogateError.reconstitute with code, facets, data and cause chain intact.
 */

import {StaticTypeCompanion} from "./companion.js";
import type {UnionToIntersection} from "./type-system-utils.js";
import {Inspect} from "./inspect.js";

// ============================================================================
// Facet Types
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom type for compile-time inference
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet<any>;

/** Phantom type carrier for error-local custom props */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

export type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};

// ============================================================================
// Facet Companion
// ============================================================================

export const ErrFacet = StaticTypeCompanion({
  /** Create a marker facet (no associated data) */
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  /** Create a data facet with typed associated data */
  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    const facet: ErrDataFacet<TData> = { kind: "data", name };
    return Object.freeze(facet);
  },

  /** Declare error-local custom props (phantom type only) */
  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

// ============================================================================
// Type Utilities
// ============================================================================

/** Extract the data type from a facet. Markers contribute {} */
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<
  FacetProps<Fs[number]>
>;

// ============================================================================
// ErrorDef / ErrorBoundary
// ============================================================================

export interface ErrorDef<
  Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[],
  D extends Record<string, unknown> = {},
> {
  readonly code: string;
  readonly domain: string;
  readonly facets: Fs;
  create(data: MergeFacetProps<Fs> & D, context?: string, cause?: SurrogateError): SurrogateError<Fs>;
  is(err: unknown): err is SurrogateError<Fs> & { readonly data: MergeFacetProps<Fs> & D };

  /** Intent wrap: run fn, if it throws, wrap the error in this ErrorDef */
  wrap<T>(data: MergeFacetProps<Fs> & D, fn: () => T): T;
}

export interface ErrorBoundary<D extends Record<string, unknown> = {}> {
  readonly domain: string;
  /** Define an error within this boundary. Code is prefixed with the domain. */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
  is(err: unknown): boolean;
  /**
   * Domain entry wrap: run fn within this boundary.
   * If anything escapes, wraps in a thin boundary error carrying the provided data.
   * Same-domain SurrogateErrors pass through unwrapped.
   */
  wrap<T>(data: D, fn: () => T): T;
}

// ============================================================================
// SurrogateError Interface
// ============================================================================

export interface SurrogateError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: MergeFacetProps<Fs>;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: SurrogateError;
  toJSON(): SurrogateErrorJSON;
  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string;
}

export interface SurrogateErrorJSON {
  code: string;
  domain: string;
  message: string;
  context?: string;
  data: Record<string, unknown>;
  facets: string[];
  stack?: string;
  cause?: SurrogateErrorJSON;
}

/**
 * Wire form of an error. Plain errors carry only a message; SurrogateErrors
 * also carry their code, boundary, facets and data.
 */
export interface SerializedError {
  message: string;
  code?: string;
  boundary?: string;
  context?: string;
  facets?: string[];
  data?: Record<string, unknown>;
  cause?: SerializedError;
}

// ============================================================================
// Helpers
// ============================================================================

/** Extract stack frames, stripping the error message line and the internal create() frame */
function stackFrames(stack: string | undefined): string {
  if (!stack) return "";
  const first = stack.indexOf("\n    at ");
  if (first === -1) return "";
  const secondFrame = stack.indexOf("\n    at ", first + 1);
  if (secondFrame !== -1 && stack.slice(first, secondFrame).includes("at create (")) {
    return stack.slice(secondFrame + 1);
  }
  return stack.slice(first + 1);
}

function messageOf(thrown: unknown): string {
  if (thrown instanceof Error) return thrown.message;
  return typeof thrown === "string" ? thrown : String(thrown);
}

/** Convert any thrown value to a SurrogateError, preserving stack */
function asSurrogateError(thrown: unknown): SurrogateErrorImpl {
  if (thrown instanceof SurrogateErrorImpl) return thrown;
  const wrapped = new SurrogateErrorImpl("unknown", "unknown", messageOf(thrown), Object.freeze(new Set<string>()), {});
  if (thrown instanceof Error && thrown.stack) wrapped.stack = thrown.stack;
  return wrapped;
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

// ============================================================================
// SurrogateError Implementation (internal)
// ============================================================================

class SurrogateErrorImpl extends Error implements SurrogateError {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: Record<string, unknown>;
  readonly facetNames: ReadonlySet<string>;
  override cause?: SurrogateErrorImpl;

  static {
    Inspect(this, (self, opts) => ({
      format: "%s",
      params: [self.prettyPrint({ color: opts.colors, includeStackTrace: true })],
    }));
  }

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: Record<string, unknown>,
    context?: string,
    cause?: SurrogateErrorImpl,
  ) {
    const fullMessage = context ? `${message} — ${context}` : message;
    super(fullMessage);
    this.name = `SurrogateError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.context = context;
    this.data = { ...data };
    this.facetNames = facetNames;
    if (cause) this.cause = cause;
  }

  /** Message without the appended context */
  get baseMessage(): string {
    const suffix = this.context ? ` — ${this.context}` : "";
    return suffix && this.message.endsWith(suffix) ? this.message.slice(0, -suffix.length) : this.message;
  }

  toJSON(): SurrogateErrorJSON {
    const json: SurrogateErrorJSON = {
      code: this.code,
      domain: this.domain,
      message: this.message,
      data: this.data,
      facets: [...this.facetNames],
      stack: this.stack,
    };
    if (this.context !== undefined) json.context = this.context;
    if (this.cause) json.cause = this.cause.toJSON();
    return json;
  }

  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string {
    const color = opts?.color ?? false;
    const includeStack = opts?.includeStackTrace ?? false;

    const c = {
      red: color ? "\x1b[31m" : "",
      dim: color ? "\x1b[2m" : "",
      reset: color ? "\x1b[0m" : "",
    };

    const lines: string[] = [`SurrogateError: ` + formatErrorLine(this, "", c, !this.cause)];

    let current: SurrogateErrorImpl | undefined = this.cause;
    let indent = "  ";
    while (current) {
      lines.push(`${indent}${c.dim}└ caused by:${c.reset} ${formatErrorLine(current, indent, c, !current.cause)}`);
      current = current.cause;
      indent += "  ";
    }

    if (includeStack) {
      const frames = stackFrames(this.stack);
      if (frames) {
        lines.push(`  ${c.dim}➝ Stack trace:${c.reset}`);
        for (const frame of frames.split("\n")) {
          if (frame.trim()) lines.push(`${c.dim}${frame}${c.reset}`);
        }
      }
    }

    return lines.join("\n");
  }
}

function formatErrorLine(
  err: SurrogateErrorImpl,
  indent: string,
  c: { red: string; dim: string; reset: string },
  isLast: boolean,
): string {
  let line = `${c.red}${err.code}${c.reset}: ${err.message}`;
  if (Object.keys(err.data).length > 0) {
    const connectorChar = isLast ? "└" : "├";
    line += `\n${indent}  ${c.dim}${connectorChar} data: ${JSON.stringify(err.data)}${c.reset}`;
  }
  return line;
}

// ============================================================================
// Internal: try/catch wrapper for both sync and async
// ============================================================================

function tryCatchWrap<T>(fn: () => T, onError: (thrown: unknown) => never): T {
  let result: T;
  try {
    result = fn();
  } catch (thrown) {
    onError(thrown);
  }
  if (isThenable(result)) {
    // Re-typed as T: the settled promise stands in for the original one
    const settled: unknown = Promise.resolve(result).catch((thrown: unknown) => onError(thrown));
    return settled as T;
  }
  return result;
}

// ============================================================================
// Internal: create an ErrorDef
// ============================================================================

function defineError<const Fs extends readonly ErrFacetAny[], D extends Record<string, unknown> = {}>(
  fullCode: string,
  domain: string,
  opts: { facets: Fs; message: (data: MergeFacetProps<Fs> & D) => string },
): ErrorDef<Fs, D> {
  const facetNames = Object.freeze(new Set(opts.facets.map((f) => f.name)));

  function create(data: MergeFacetProps<Fs> & D, context?: string, cause?: SurrogateError): SurrogateError<Fs> {
    const err = new SurrogateErrorImpl(
      fullCode,
      domain,
      opts.message(data),
      facetNames,
      data as Record<string, unknown>,
      context,
      cause === undefined ? undefined : asSurrogateError(cause),
    );
    Error.captureStackTrace(err, create);
    return err as SurrogateError as SurrogateError<Fs>;
  }

  return Object.freeze({
    code: fullCode,
    domain,
    facets: opts.facets,
    create,

    is(err: unknown): err is SurrogateError<Fs> & { readonly data: MergeFacetProps<Fs> & D } {
      return err instanceof SurrogateErrorImpl && err.code === fullCode;
    },

    wrap<T>(data: MergeFacetProps<Fs> & D, fn: () => T): T {
      return tryCatchWrap(fn, (thrown) => {
        throw create(data, undefined, asSurrogateError(thrown));
      });
    },
  });
}

function reconstitute(serialized: SerializedError): SurrogateErrorImpl {
  const cause = serialized.cause ? reconstitute(serialized.cause) : undefined;
  const code = serialized.code ?? "unknown";
  const domain = serialized.boundary ?? "unknown";
  return new SurrogateErrorImpl(
    code,
    domain,
    serialized.message,
    Object.freeze(new Set(serialized.facets ?? [])),
    serialized.data ?? {},
    serialized.context,
    cause,
  );
}

function serialize(err: unknown): SerializedError {
  if (!(err instanceof SurrogateErrorImpl)) {
    return { message: messageOf(err) };
  }
  const serialized: SerializedError = {
    message: err.baseMessage,
    code: err.code,
    boundary: err.domain,
    facets: [...err.facetNames],
    data: { ...err.data },
  };
  if (err.context !== undefined) serialized.context = err.context;
  if (err.cause) serialized.cause = serialize(err.cause);
  return serialized;
}

// ============================================================================
// SurrogateError Companion
// ============================================================================

/** Static methods for SurrogateError */
export const SurrogateError = StaticTypeCompanion({
  /**
   * Define a new error type with a code, facets, and message function.
   * The code's prefix before the first "." becomes the domain.
   *
   * Prefer using boundary.define() instead for domain-owned errors.
   */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: {
      customProps?: P;
      facets: Fs;
      message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string;
    },
  ): ErrorDef<Fs, InferPropsData<P>> {
    const dotIdx = code.indexOf(".");
    const domain = dotIdx === -1 ? code : code.slice(0, dotIdx);
    return defineError(code, domain, opts);
  },

  /**
   * Create an error boundary for a domain.
   * Errors defined via the boundary are automatically prefixed with the domain.
   *
   *   const Proxy = SurrogateError.boundary("proxy", {
   *     customProps: ErrFacet.props<{ blueprint: string }>(),
   *   });
   *   Proxy.wrap({ blueprint: "demo.CalcProxy" }, fn);
   */
  boundary<P extends ErrProps = ErrProps>(domain: string, _opts?: { customProps?: P }): ErrorBoundary<InferPropsData<P>> {
    type BD = InferPropsData<P>;

    // The boundary's thin error, carrying boundary data when wrapping
    const boundaryErrorDef = defineError<readonly [], BD>(`${domain}.error`, domain, {
      facets: [] as const,
      message: () => `${domain} error`,
    });

    return {
      domain,

      define<const Fs extends readonly ErrFacetAny[], PP extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: PP; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<PP>) => string },
      ): ErrorDef<Fs, InferPropsData<PP>> {
        return defineError(`${domain}.${code}`, domain, opts);
      },

      is(err: unknown): boolean {
        return err instanceof SurrogateErrorImpl && err.domain === domain;
      },

      wrap<T>(data: BD, fn: () => T): T {
        return tryCatchWrap(fn, (thrown) => {
          if (thrown instanceof SurrogateErrorImpl && thrown.domain === domain) {
            throw thrown;
          }
          throw boundaryErrorDef.create(data, undefined, asSurrogateError(thrown));
        });
      },
    };
  },

  isSurrogateError(err: unknown): err is SurrogateError {
    return err instanceof SurrogateErrorImpl;
  },

  /**
   * Check if a SurrogateError has a specific facet.
   * For DataFacet<D>, narrows err.data to include D.
   */
  has<F extends ErrFacetAny>(
    err: unknown,
    facet: F,
  ): err is SurrogateError & { readonly data: FacetProps<F> } {
    return err instanceof SurrogateErrorImpl && err.facetNames.has(facet.name);
  },

  inDomain(err: unknown, domain: string): boolean {
    return err instanceof SurrogateErrorImpl && err.domain === domain;
  },

  /** Convert any value to a SurrogateError. SurrogateErrors are returned unchanged. */
  wrap(err: unknown): SurrogateError {
    return asSurrogateError(err);
  },

  /** Flatten an error (and its cause chain) into its wire form */
  serialize,

  /** Rebuild a SurrogateError from its wire form */
  reconstitute(serialized: SerializedError): SurrogateError {
    return reconstitute(serialized);
  },
});
