/**
 * CohortError - errors composed from facets, owned by a boundary.
 *
 * A facet is a marker (BadInput) or carries typed data (HasExpression).
 * Every error is defined through the boundary of the package that raises it,
 * and the boundary's domain prefixes the code: `query-expressions.syntax_error`.
 * Callers discriminate by exact definition (`Def.is`), by facet
 * (`CohortError.has`) or by boundary (`Boundary.is`).
 */

import {StaticTypeCompanion} from "./companion.js";
import {UnionToIntersection} from "./type-system-utils.js";
import {Fmt} from "./fmt.js";

// ============================================================================
// Facets
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet<Record<string, unknown>>;

/** Phantom carrier for data that only one error definition has */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

export type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};

export const ErrFacet = StaticTypeCompanion({
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    return Object.freeze({ kind: "data" as const, name }) as ErrDataFacet<TData>;
  },

  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: "props" } as ErrProps<T>;
  },
});

/** Markers contribute {} */
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<
  FacetProps<Fs[number]>
>;

// ============================================================================
// Definitions and boundaries
// ============================================================================

export interface ErrorDef<
  Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[],
  D extends Record<string, unknown> = {},
> {
  readonly code: string;
  readonly facets: Fs;
  create(data: MergeFacetProps<Fs> & D): CohortError<Fs>;
  is(err: unknown): err is CohortError<Fs> & { readonly data: MergeFacetProps<Fs> & D };
}

export interface ErrorBoundary {
  readonly domain: string;
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
  /** True for errors defined through this boundary */
  is(err: unknown): boolean;
}

export interface CohortError<Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[]> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly data: MergeFacetProps<Fs>;
  readonly facetNames: ReadonlySet<string>;
  /** `code: message`, the data on its own line, then (optionally) the stack frames. */
  prettyPrint(fmt?: Fmt, opts?: { includeStackTrace?: boolean }): string;
}

// ============================================================================
// Implementation (internal)
// ============================================================================

const NO_FACETS: ReadonlySet<string> = Object.freeze(new Set<string>());

class CohortErrorImpl extends Error implements CohortError {
  constructor(
    readonly code: string,
    readonly domain: string,
    message: string,
    readonly facetNames: ReadonlySet<string>,
    readonly data: Record<string, unknown>,
  ) {
    super(message);
    this.name = `CohortError[${code}]`;
  }

  prettyPrint(fmt: Fmt = Fmt.noop, opts: { includeStackTrace?: boolean } = {}): string {
    const lines = [`${fmt.red(this.code)}: ${this.message}`];
    if (Object.keys(this.data).length > 0) {
      lines.push(fmt.dim(`  data: ${JSON.stringify(this.data)}`));
    }
    if (opts.includeStackTrace) {
      for (const frame of stackFrames(this.stack)) lines.push(fmt.dim(frame));
    }
    return lines.join("\n");
  }
}

function stackFrames(stack: string | undefined): string[] {
  return (stack ?? "").split("\n").filter((line) => line.trimStart().startsWith("at "));
}

// ============================================================================
// CohortError Companion
// ============================================================================

export const CohortError = StaticTypeCompanion({
  /** Create the boundary through which a package defines its errors. */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,

      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
      ): ErrorDef<Fs, InferPropsData<P>> {
        const fullCode = `${domain}.${code}`;
        const facetNames = Object.freeze(new Set(opts.facets.map((f) => f.name)));

        function create(data: MergeFacetProps<Fs> & InferPropsData<P>): CohortError<Fs> {
          const err = new CohortErrorImpl(
            fullCode,
            domain,
            opts.message(data),
            facetNames,
            { ...(data as Record<string, unknown>) },
          ) as unknown as CohortError<Fs>;
          Error.captureStackTrace(err, create);
          return err;
        }

        return Object.freeze({
          code: fullCode,
          facets: opts.facets,
          create,
          is(err: unknown): err is CohortError<Fs> & { readonly data: MergeFacetProps<Fs> & InferPropsData<P> } {
            return err instanceof CohortErrorImpl && err.code === fullCode;
          },
        });
      },

      is(err: unknown): boolean {
        return err instanceof CohortErrorImpl && err.domain === domain;
      },
    };
  },

  /**
   * True when `err` is a CohortError carrying `facet`; narrows `err.data`
   * for data facets.
   */
  has<F extends ErrFacetAny>(
    err: unknown,
    facet: F,
  ): err is CohortError & { readonly data: FacetProps<F> } {
    return err instanceof CohortErrorImpl && err.facetNames.has(facet.name);
  },

  /** Any thrown value as a CohortError (code `unknown.error`), keeping its stack. */
  wrap(err: unknown): CohortError {
    if (err instanceof CohortErrorImpl) return err;
    const message = err instanceof Error ? err.message : String(err);
    const wrapped = new CohortErrorImpl("unknown.error", "unknown", message, NO_FACETS, {});
    if (err instanceof Error && err.stack) wrapped.stack = err.stack;
    return wrapped;
  },
});
