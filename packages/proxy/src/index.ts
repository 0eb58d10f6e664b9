/**
 * @surrogate/proxy - Typed interface proxies that route every call to one
 * invocation handler.
 */

// Semantic types and conversion
export { Type } from "./semantic-type.js";
export type {
  PrimitiveKind,
  PrimitiveValues,
  Semantics,
  SemanticKind,
  SemanticType,
  VoidType,
  PrimitiveType,
  EnumMembers,
  EnumType,
  StructType,
  ReferenceType,
  PromiseType,
  SyncSemanticType,
  SemanticTypeAny,
  ValueOf,
} from "./semantic-type.js";
export { convertResult, boxArgument, describeValue, PRIMITIVE_CONVERSIONS } from "./conversion.js";
export type { Conversion } from "./conversion.js";

// Definitions (InterfaceDef, ClassDef, Method, Property are both type and value)
export { Method, Property } from "./member.js";
export type { MethodSignature, PropertySignature, MemberSignature, MethodFn, ParamValues } from "./member.js";
export { InterfaceDef } from "./interface-def.js";
export type { InterfaceName, InterfaceDefAny, InterfaceShape, MethodDefinitions, PropertyDefinitions } from "./interface-def.js";
export { ClassDef } from "./class-def.js";
export type { ClassDefAny, TypeDefAny, ProxyOf } from "./class-def.js";

// Descriptors
export { reflectInterface } from "./descriptor.js";
export type { MethodDescriptor, MethodKind, PropertyDescriptor, InterfaceDescriptor } from "./descriptor.js";
export { DescriptorCache, InMemoryDescriptorCache } from "./descriptor-cache.js";
export type { DescriptorTransaction } from "./descriptor-cache.js";

// Handlers
export { InvocationHandler, HandlerContract } from "./invocation-handler.js";
export type { InvokeFn } from "./invocation-handler.js";

// Synthesis
export { ProxyObject } from "./proxy-object.js";
export type { ProxyBase } from "./proxy-object.js";
export { BlueprintBuilder, ProxyBlueprint, interfaceClosure } from "./blueprint-builder.js";
export type { BlueprintRequest, ProxyClass } from "./blueprint-builder.js";
export { completeCall } from "./forwarding.js";
export type { ProxyBinding, ForwardingSite, ForwardingContext } from "./forwarding.js";
export { InMemoryRegistry } from "./registry.js";
export type { Registry } from "./registry.js";
export { ProxyFactory } from "./proxy-factory.js";
export type { ProxyFactoryOptions } from "./proxy-factory.js";

// RPC
export { RpcInvocationHandler } from "./rpc/rpc-invocation-handler.js";
export { ProxyDispatcher } from "./rpc/proxy-dispatcher.js";
export type { ProxyDispatcherOptions } from "./rpc/proxy-dispatcher.js";

// Errors
export * from "./errors.js";
