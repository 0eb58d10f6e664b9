import util, {type InspectOptions} from 'node-inspect-extracted'

export interface InspectFormat {
  format: string
  params: unknown[]
}

/**
 * Assign a custom inspect renderer to a class prototype.
 * Call inside a `static {}` block — assigns once to the prototype, not per instance.
 *
 * The `fn` receives the instance as `self` and returns a format string with params.
 * Format specifiers (%s, %O, %d, etc.) are handled by `util.formatWithOptions`.
 *
 * ```typescript
 * class Blueprint {
 *   static {
 *     Inspect(this, (self) => ({ format: "Blueprint( %s )", params: [self.name] }));
 *   }
 * }
 * ```
 */
export function Inspect<T extends object>(cls: { prototype: T }, fn: (self: T, options: InspectOptions) => InspectFormat): void {
  Object.defineProperty(cls.prototype, inspect, {
    configurable: true,
    writable: true,
    value(this: T, depth: number | undefined, options: InspectOptions): string {
      const opts = { ...options, depth: (depth ?? 2) - 1 }
      const data = fn(this, opts)
      return util.formatWithOptions(opts, data.format, ...data.params)
    },
  })
}

export const inspect: unique symbol = Symbol.for('nodejs.util.inspect.custom')
