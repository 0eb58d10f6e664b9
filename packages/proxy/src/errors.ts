/**
 * Proxy boundary errors.
 *
 * Taxonomy:
 *   BadInput                       invalid arguments to the factory or builder,
 *                                  or a handler result outside the declared type
 *   NotFound + InvariantViolated   a forwarding routine asked for a descriptor
 *                                  that was never registered (engine bug)
 *   SynthesisFailed                the interface closure cannot be represented
 */

import { BadInput, ErrFacet, InvariantViolated, NotFound, NotSupported, SurrogateError } from "@surrogate/core"

export const ProxyBoundary = SurrogateError.boundary("proxy", {
  customProps: ErrFacet.props<{ blueprint: string }>(),
})

/** The interface closure contains something the builder cannot represent */
export const SynthesisFailed = ErrFacet.marker("SynthesisFailed")

export const HasInterface = ErrFacet.data<{ interfaceName: string }>("HasInterface")
export const HasMember = ErrFacet.data<{ interfaceName: string; member: string }>("HasMember")
export const HasBlueprint = ErrFacet.data<{ blueprint: string }>("HasBlueprint")

// ============================================================================
// InvalidArgument
// ============================================================================

export const ErrHandlerRequired = ProxyBoundary.define("handler_required", {
  facets: [BadInput, HasBlueprint],
  message: (d) => `A handler is required to instantiate ${d.blueprint}`,
})

export const ErrInvalidHandler = ProxyBoundary.define("invalid_handler", {
  customProps: ErrFacet.props<{ contract: string }>(),
  facets: [BadInput, HasBlueprint],
  message: (d) => `Handler does not satisfy ${d.contract} required by ${d.blueprint}`,
})

export const ErrHandlerContractRequired = ProxyBoundary.define("handler_contract_required", {
  facets: [BadInput, HasBlueprint],
  message: (d) => `No handler contract given for ${d.blueprint}`,
})

export const ErrNoInterfaces = ProxyBoundary.define("no_interfaces", {
  facets: [BadInput, HasBlueprint],
  message: (d) => `${d.blueprint} has no interfaces to implement`,
})

export const ErrInvalidTarget = ProxyBoundary.define("invalid_target", {
  customProps: ErrFacet.props<{ received: string }>(),
  facets: [BadInput],
  message: (d) => `Proxy target must be an InterfaceDef or ClassDef, received ${d.received}`,
})

export const ErrTargetKindMismatch = ProxyBoundary.define("target_kind_mismatch", {
  customProps: ErrFacet.props<{ target: string; kind: string; flagged: boolean }>(),
  facets: [BadInput],
  message: (d) =>
    `${d.target} is ${d.kind === "interface" ? "an interface" : "a class"} but was flagged as ${d.flagged ? "an interface" : "a class"}`,
})

export const ErrInvalidInterfaceName = ProxyBoundary.define("invalid_interface_name", {
  facets: [BadInput, HasInterface],
  message: (d) => `"${d.interfaceName}" is not a valid qualified interface name`,
})

export const ErrInvalidMemberName = ProxyBoundary.define("invalid_member_name", {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput, HasMember],
  message: (d) => `Invalid member name "${d.member}" on ${d.interfaceName}: ${d.reason}`,
})

export const ErrInvalidEnumValue = ProxyBoundary.define("invalid_enum_value", {
  customProps: ErrFacet.props<{ enumName: string; member: string; value: number }>(),
  facets: [BadInput],
  message: (d) => `${d.enumName}.${d.member} must have an int32 value, got ${d.value}`,
})

export const ErrInvalidBaseType = ProxyBoundary.define("invalid_base_type", {
  facets: [BadInput, HasBlueprint],
  message: (d) => `Base type of ${d.blueprint} must be a class with a parameterless constructor`,
})

export const ErrIllegalInvocation = ProxyBoundary.define("illegal_invocation", {
  customProps: ErrFacet.props<{ member: string }>(),
  facets: [BadInput, HasBlueprint],
  message: (d) => `${d.blueprint}.${d.member} called on an object that is not a ${d.blueprint} instance`,
})

export const ErrResultNotConvertible = ProxyBoundary.define("result_not_convertible", {
  customProps: ErrFacet.props<{ expected: string; reason: string }>(),
  facets: [BadInput, HasMember],
  message: (d) => `${d.interfaceName}.${d.member} expected a ${d.expected} result: ${d.reason}`,
})

// ============================================================================
// NotFound
// ============================================================================

export const ErrInterfaceNotRegistered = ProxyBoundary.define("interface_not_registered", {
  facets: [NotFound, InvariantViolated, HasInterface],
  message: (d) => `Interface ${d.interfaceName} is not registered in the descriptor cache`,
})

export const ErrMethodIndexOutOfRange = ProxyBoundary.define("method_index_out_of_range", {
  customProps: ErrFacet.props<{ index: number; count: number }>(),
  facets: [NotFound, InvariantViolated, HasInterface],
  message: (d) => `Method index ${d.index} is out of range for ${d.interfaceName} (${d.count} methods)`,
})

export const ErrPropertyIndexOutOfRange = ProxyBoundary.define("property_index_out_of_range", {
  customProps: ErrFacet.props<{ index: number; count: number }>(),
  facets: [NotFound, InvariantViolated, HasInterface],
  message: (d) => `Property index ${d.index} is out of range for ${d.interfaceName} (${d.count} properties)`,
})

// ============================================================================
// SynthesisFailure
// ============================================================================

export const ErrUnsupportedMember = ProxyBoundary.define("unsupported_member", {
  customProps: ErrFacet.props<{ received: string }>(),
  facets: [SynthesisFailed, HasMember],
  message: (d) => `${d.interfaceName}.${d.member} is a ${d.received}; only methods and properties can be proxied`,
})

export const ErrMemberConflict = ProxyBoundary.define("member_conflict", {
  customProps: ErrFacet.props<{ blueprint: string; existing: string }>(),
  facets: [SynthesisFailed, HasMember],
  message: (d) => `${d.blueprint} cannot implement ${d.interfaceName}.${d.member}: already provided by ${d.existing}`,
})

export const ErrInterfaceIdentityConflict = ProxyBoundary.define("interface_identity_conflict", {
  facets: [SynthesisFailed, HasInterface],
  message: (d) => `A different interface named ${d.interfaceName} is already registered`,
})

export const ErrBlueprintIdentityConflict = ProxyBoundary.define("blueprint_identity_conflict", {
  facets: [SynthesisFailed, HasBlueprint],
  message: (d) => `${d.blueprint} is already cached for a different target of the same name`,
})

// ============================================================================
// NotSupported
// ============================================================================

export const ErrBlueprintSealed = ProxyBoundary.define("blueprint_sealed", {
  facets: [NotSupported, HasBlueprint],
  message: (d) => `${d.blueprint} is sealed and cannot be subclassed`,
})

export const ErrRpcRequiresAsync = ProxyBoundary.define("rpc_requires_async", {
  facets: [NotSupported, HasMember],
  message: (d) => `${d.interfaceName}.${d.member} must return a promise to be called over RPC`,
})
