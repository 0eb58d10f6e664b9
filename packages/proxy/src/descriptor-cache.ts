/**
 * DescriptorCache — process-wide table of reflected interfaces.
 *
 * Keyed by qualified interface name. Append-only: an entry is created the
 * first time a blueprint generates the interface's methods and is never
 * removed. Forwarding routines resolve their MethodDescriptor here by
 * (interface name, index) on every call.
 */

import type { InterfaceDefAny } from "./interface-def.js"
import { reflectInterface, type InterfaceDescriptor, type MethodDescriptor, type PropertyDescriptor } from "./descriptor.js"
import {
  ErrInterfaceIdentityConflict,
  ErrInterfaceNotRegistered,
  ErrMethodIndexOutOfRange,
  ErrPropertyIndexOutOfRange,
} from "./errors.js"

// ============================================================================
// DescriptorCache Interface
// ============================================================================

/** Stages registrations made during one blueprint build */
export interface DescriptorTransaction {
  register(def: InterfaceDefAny): InterfaceDescriptor
}

export interface DescriptorCache {
  /**
   * Reflect and store `def` under its qualified name. Re-registering the same
   * definition is a no-op; a different definition under a taken name fails.
   */
  register(def: InterfaceDefAny): InterfaceDescriptor

  /** Fails with NotFound when the name is unknown or the index out of range. */
  resolveMethod(interfaceName: string, index: number): MethodDescriptor

  /** Property counterpart of resolveMethod. Forwarding routines never call it. */
  resolveProperty(interfaceName: string, index: number): PropertyDescriptor

  get(interfaceName: string): InterfaceDescriptor | undefined
  has(interfaceName: string): boolean
  readonly size: number

  /**
   * Run `fn` with a staging area. Staged registrations are seen by later
   * `tx.register` calls only, and are committed when `fn` returns; a throw
   * discards them.
   */
  transaction<T>(fn: (tx: DescriptorTransaction) => T): T
}

// ============================================================================
// DescriptorCache Implementation
// ============================================================================

export class InMemoryDescriptorCache implements DescriptorCache {
  private readonly entries = new Map<string, InterfaceDescriptor>()

  get size(): number {
    return this.entries.size
  }

  register(def: InterfaceDefAny): InterfaceDescriptor {
    const existing = this.claim(def, this.entries)
    if (existing) return existing
    const descriptor = reflectInterface(def)
    this.entries.set(descriptor.name, descriptor)
    return descriptor
  }

  resolveMethod(interfaceName: string, index: number): MethodDescriptor {
    const descriptor = this.require(interfaceName)
    const method = Number.isInteger(index) ? descriptor.methods[index] : undefined
    if (!method) {
      throw ErrMethodIndexOutOfRange.create({ interfaceName, index, count: descriptor.methods.length })
    }
    return method
  }

  resolveProperty(interfaceName: string, index: number): PropertyDescriptor {
    const descriptor = this.require(interfaceName)
    const property = Number.isInteger(index) ? descriptor.properties[index] : undefined
    if (!property) {
      throw ErrPropertyIndexOutOfRange.create({ interfaceName, index, count: descriptor.properties.length })
    }
    return property
  }

  get(interfaceName: string): InterfaceDescriptor | undefined {
    return this.entries.get(interfaceName)
  }

  has(interfaceName: string): boolean {
    return this.entries.has(interfaceName)
  }

  transaction<T>(fn: (tx: DescriptorTransaction) => T): T {
    const staged = new Map<string, InterfaceDescriptor>()
    const tx: DescriptorTransaction = {
      register: (def) => {
        const existing = this.claim(def, this.entries) ?? this.claim(def, staged)
        if (existing) return existing
        const descriptor = reflectInterface(def)
        staged.set(descriptor.name, descriptor)
        return descriptor
      },
    }

    const result = fn(tx)
    for (const [name, descriptor] of staged) {
      this.entries.set(name, descriptor)
    }
    return result
  }

  /** The entry already stored for def's name, if it is the same definition */
  private claim(def: InterfaceDefAny, entries: ReadonlyMap<string, InterfaceDescriptor>): InterfaceDescriptor | undefined {
    const existing = entries.get(def.name)
    if (existing && existing.def !== def) {
      throw ErrInterfaceIdentityConflict.create({ interfaceName: def.name })
    }
    return existing
  }

  private require(interfaceName: string): InterfaceDescriptor {
    const descriptor = this.entries.get(interfaceName)
    if (!descriptor) {
      throw ErrInterfaceNotRegistered.create({ interfaceName })
    }
    return descriptor
  }
}

let globalCache: DescriptorCache | undefined

export const DescriptorCache = {
  /** The process-wide cache, created on first use */
  global(): DescriptorCache {
    globalCache ??= new InMemoryDescriptorCache()
    return globalCache
  },
}
