import type { Json } from "./json.js"
import { isJsonObject } from "./json.js"
import type { Value } from "./value.js"
import { appendItem, makeArray, makeBoolean, makeNull, makeNumber, makeObject, makeString, setItem } from "./value.js"

// CHANGE: bridge plain JavaScript values and owned document trees
// WHY: tests and callers build trees from literals and hand results to other code
// QUOTE(TZ): n/a
// REF: req-convert-1
// SOURCE: n/a
// FORMAT THEOREM: ∀j ∈ Json (finite numbers): toJson(fromJson(j)) ≅ j
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: fromJson always returns a fresh, unowned root
// COMPLEXITY: O(n)

export const fromJson = (json: Json): Value => {
  if (json === null) {
    return makeNull()
  }
  if (typeof json === "boolean") {
    return makeBoolean(json)
  }
  if (typeof json === "number") {
    return makeNumber(json)
  }
  if (typeof json === "string") {
    return makeString(json)
  }
  if (isJsonObject(json)) {
    const object = makeObject()
    for (const [key, child] of Object.entries(json)) {
      setItem(object, key, fromJson(child))
    }
    return object
  }
  const array = makeArray()
  for (const child of json) {
    appendItem(array, fromJson(child))
  }
  return array
}

export const toJson = (value: Value): Json => {
  switch (value._tag) {
    case "Null":
      return null
    case "Boolean":
    case "Number":
    case "String":
      return value.value
    case "Object":
      // fromEntries defines own properties, so a "__proto__" key stays data
      return Object.fromEntries(Array.from(value.entries, ([key, child]): [string, Json] => [key, toJson(child)]))
    case "Array":
      return value.elements.map(toJson)
  }
}
