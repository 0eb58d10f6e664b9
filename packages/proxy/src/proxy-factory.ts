/**
 * ProxyFactory — creates proxies, building each blueprint at most once.
 *
 *   const calc = factory.create(InvocationHandler.from((_p, m, args) => ...), Calc)
 *   calc.add(2, 3)
 *
 * Blueprints are cached by identity (`<target name>Proxy`) for the lifetime
 * of the factory. `ProxyFactory.getInstance()` returns the process-wide
 * factory, which shares the process-wide descriptor cache.
 */

import { createLogger, SurrogateConfig, SurrogateError, type Logger } from "@surrogate/core"
import { ClassDef, type ProxyOf, type TypeDefAny } from "./class-def.js"
import { InterfaceDef, memberKind } from "./interface-def.js"
import { DescriptorCache } from "./descriptor-cache.js"
import { HandlerContract, type InvocationHandler } from "./invocation-handler.js"
import { BlueprintBuilder, ProxyBlueprint } from "./blueprint-builder.js"
import type { ProxyBase } from "./proxy-object.js"
import { InMemoryRegistry, type Registry } from "./registry.js"
import {
  ErrBlueprintIdentityConflict,
  ErrHandlerRequired,
  ErrInvalidTarget,
  ErrTargetKindMismatch,
} from "./errors.js"

export interface ProxyFactoryOptions {
  descriptors?: DescriptorCache
  logger?: Logger
  /** Overrides merged over the environment */
  config?: Partial<SurrogateConfig>
  /** Base class of every synthesized proxy */
  base?: ProxyBase
  /** What handlers passed to create() must satisfy */
  contract?: HandlerContract
}

let instance: ProxyFactory | undefined

export class ProxyFactory {
  readonly config: SurrogateConfig
  private readonly logger: Logger
  private readonly builder: BlueprintBuilder
  private readonly blueprints: Registry<string, ProxyBlueprint> = new InMemoryRegistry()
  private readonly base: ProxyBase | undefined
  private readonly contract: HandlerContract

  constructor(opts: ProxyFactoryOptions = {}) {
    this.config = SurrogateConfig.build(opts.config)
    this.logger = opts.logger ?? createLogger(this.config.logLevel)
    this.builder = new BlueprintBuilder(opts.descriptors ?? DescriptorCache.global(), this.logger)
    this.base = opts.base
    this.contract = opts.contract ?? HandlerContract.invocation
  }

  /** The process-wide factory, created on first use */
  static getInstance(): ProxyFactory {
    instance ??= new ProxyFactory()
    return instance
  }

  /** Blueprint identity for a target */
  static identityOf(target: TypeDefAny): string {
    return `${target.name}Proxy`
  }

  /**
   * Create a proxy for `target` bound to `handler`.
   *
   * `isTargetInterface` defaults to the target's own kind; passing a value
   * that contradicts it fails.
   */
  create<T extends TypeDefAny>(handler: InvocationHandler | null | undefined, target: T, isTargetInterface?: boolean): ProxyOf<T> {
    if (!InterfaceDef.is(target) && !ClassDef.is(target)) {
      throw ErrInvalidTarget.create({ received: memberKind(target) })
    }
    const isInterface = target.kind === "interface"
    if (isTargetInterface !== undefined && isTargetInterface !== isInterface) {
      throw ErrTargetKindMismatch.create({ target: target.name, kind: target.kind, flagged: isTargetInterface })
    }
    if (handler === null || handler === undefined) {
      throw ErrHandlerRequired.create({ blueprint: ProxyFactory.identityOf(target) })
    }
    // The prototype carries every member of the target's closure
    const proxy: unknown = this.blueprintFor(target).instantiate(handler)
    return proxy as ProxyOf<T>
  }

  /** The cached blueprint for `target`, built on first request */
  blueprintFor(target: TypeDefAny): ProxyBlueprint {
    const identity = ProxyFactory.identityOf(target)
    const blueprint = this.blueprints.getOrCreate(identity, () => this.build(identity, target))
    if (blueprint.target !== target) {
      throw ErrBlueprintIdentityConflict.create({ blueprint: identity })
    }
    return blueprint
  }

  blueprintOf(proxy: unknown): ProxyBlueprint | undefined {
    return ProxyBlueprint.of(proxy)
  }

  handlerOf(proxy: unknown): InvocationHandler | undefined {
    return ProxyBlueprint.of(proxy)?.handlerOf(proxy)
  }

  isProxy(value: unknown): boolean {
    return ProxyBlueprint.of(value) !== undefined
  }

  /** Number of cached blueprints */
  get size(): number {
    return this.blueprints.size
  }

  private build(identity: string, target: TypeDefAny): ProxyBlueprint {
    const interfaces = InterfaceDef.is(target) ? [target] : target.implements
    try {
      const blueprint = this.builder.build({
        name: identity,
        target,
        interfaces,
        contract: this.contract,
        ...(this.base === undefined ? {} : { base: this.base }),
      })
      this.logger.debug("Synthesized proxy blueprint", {
        blueprint: identity,
        interfaces: blueprint.interfaces.length,
        methods: blueprint.methods.length,
      })
      return blueprint
    } catch (err) {
      this.logger.warn("Proxy blueprint synthesis failed", {
        blueprint: identity,
        code: SurrogateError.isSurrogateError(err) ? err.code : "unknown",
      })
      throw err
    }
  }
}
