// CHANGE: describe plain JavaScript JSON values at the library boundary
// WHY: let callers move between native values and owned document trees
// QUOTE(TZ): n/a
// REF: req-convert-1
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: isJsonObject(x) ↔ typeof x = "object" ∧ x ≠ null ∧ ¬isArray(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)
