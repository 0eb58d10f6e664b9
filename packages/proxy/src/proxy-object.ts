import { Inspect, type NullaryConstructor } from "@surrogate/core"

/**
 * Default base of every synthesized proxy class. Carries no state and no
 * string-keyed members, so it never shadows an interface member.
 */
export class ProxyObject {
  static {
    Inspect(this, (self) => ({
      format: "%s <proxy>",
      params: [self.constructor.name],
    }))
  }
}

/** A base type for synthesized classes: any class with a parameterless constructor */
export type ProxyBase = NullaryConstructor<ProxyObject>
