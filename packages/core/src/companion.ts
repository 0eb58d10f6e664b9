/** Use when defining a companion object for a type.
 *  For example, InterfaceDef (the type) and InterfaceDef (the companion object).
 *
 *  Does nothing at runtime; it marks the object as the static side of a type.
 * */
export function StaticTypeCompanion<const Companion>(t: Companion): Companion {
  return t
}
