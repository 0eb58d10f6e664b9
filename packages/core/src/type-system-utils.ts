/** Convert a union to an intersection */
export type UnionToIntersection<U> = (U extends any ? (x: U) => void : never) extends (
    x: infer I,
  ) => void
  ? I
  : never;

/** Flatten an intersection into a single object type for readable hovers */
export type Simplify<T> = { [K in keyof T]: T[K] } & {}

/** Any class whose instances are T and whose constructor takes no arguments */
export type NullaryConstructor<T extends object = object> = new () => T
