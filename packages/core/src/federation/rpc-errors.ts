/**
 * RPC boundary errors — errors originating from the RPC dispatch layer.
 *
 * These are thrown by dispatchers when routing fails (unknown target,
 * unknown method). They use the standard facet system so callers can
 * catch by facet (BadInput, NotFound) or by boundary (Rpc).
 */

import { SurrogateError, ErrFacet } from "../surrogate-error.js"
import { BadInput, NotFound, NotSupported } from "../errors/errors.js"

export const Rpc = SurrogateError.boundary("rpc")

/** Request targeted an interface nothing was registered for */
export const ErrUnknownTarget = Rpc.define("unknown_target", {
  customProps: ErrFacet.props<{ target: string }>(),
  facets: [NotFound],
  message: (d) => `Unknown RPC target "${d.target}"`,
})

/** Request called an unknown method on a known target */
export const ErrUnknownMethod = Rpc.define("unknown_method", {
  customProps: ErrFacet.props<{ target: string; method: string }>(),
  facets: [BadInput],
  message: (d) => `Unknown method "${d.method}" on target "${d.target}"`,
})

/** Transport was used after close() */
export const ErrTransportClosed = Rpc.define("transport_closed", {
  facets: [NotSupported],
  message: () => "Transport is closed",
})
