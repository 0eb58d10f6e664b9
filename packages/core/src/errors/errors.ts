/**
 * Standard facets shared by every boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 */

import {ErrFacet} from "../surrogate-error.js";

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

export const NotSupported = ErrFacet.marker("NotSupported");

/** Internal invariant violated — always a bug */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");
