import * as Option from "effect/Option"

// CHANGE: introduce the owned document tree (tagged variants + ownership registry)
// WHY: containers must own their children exclusively so trees never share or cycle
// QUOTE(TZ): "a present key mapped to Null is different from the key being absent"
// REF: req-value-model-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v: owner(v) is unique ∧ ¬ancestor(v, v)
// PURITY: CORE
// EFFECT: mutates containers in place
// INVARIANT: every child has exactly one owning container; keys are unique per object
// COMPLEXITY: O(1) per insertion, O(depth) ancestor check

export interface NullValue {
  readonly _tag: "Null"
}

export interface BooleanValue {
  readonly _tag: "Boolean"
  readonly value: boolean
}

export interface NumberValue {
  readonly _tag: "Number"
  readonly value: number
}

export interface StringValue {
  readonly _tag: "String"
  readonly value: string
}

/**
 * Object node. `entries` is the backing map; mutate it only through
 * {@link setItem} and {@link deleteItem} so ownership stays consistent.
 */
export interface ObjectValue {
  readonly _tag: "Object"
  readonly entries: Map<string, Value>
}

/**
 * Array node. `elements` is the backing store; mutate it only through
 * {@link appendItem} and {@link setElement}.
 */
export interface ArrayValue {
  readonly _tag: "Array"
  readonly elements: Array<Value>
}

export type Value =
  | NullValue
  | BooleanValue
  | NumberValue
  | StringValue
  | ObjectValue
  | ArrayValue

export type ContainerValue = ObjectValue | ArrayValue

export type ValueTag = Value["_tag"]

// child -> owning container
const owners = new WeakMap<Value, ContainerValue>()

// key order for cursor iteration; dropped whenever an object's key set changes
const keySnapshots = new WeakMap<ObjectValue, ReadonlyArray<string>>()

export const makeNull = (): NullValue => ({ _tag: "Null" })

export const makeBoolean = (value: boolean): BooleanValue => ({ _tag: "Boolean", value })

export const makeNumber = (value: number): NumberValue => ({ _tag: "Number", value })

export const makeString = (value: string): StringValue => ({ _tag: "String", value })

export const makeObject = (): ObjectValue => ({ _tag: "Object", entries: new Map() })

export const makeArray = (): ArrayValue => ({ _tag: "Array", elements: [] })

export const isNull = (value: Value): value is NullValue => value._tag === "Null"
export const isBoolean = (value: Value): value is BooleanValue => value._tag === "Boolean"
export const isNumber = (value: Value): value is NumberValue => value._tag === "Number"
export const isString = (value: Value): value is StringValue => value._tag === "String"
export const isObject = (value: Value): value is ObjectValue => value._tag === "Object"
export const isArray = (value: Value): value is ArrayValue => value._tag === "Array"

export const isContainer = (value: Value): value is ContainerValue =>
  value._tag === "Object" || value._tag === "Array"

/**
 * The container currently owning `value`, if any.
 */
export const ownerOf = (value: Value): Option.Option<ContainerValue> => Option.fromNullable(owners.get(value))

const isSelfOrAncestor = (candidate: Value, container: ContainerValue): boolean => {
  let current: ContainerValue | undefined = container
  while (current !== undefined) {
    if (current === candidate) {
      return true
    }
    current = owners.get(current)
  }
  return false
}

const canAdopt = (container: ContainerValue, value: Value): boolean =>
  !owners.has(value) && !isSelfOrAncestor(value, container)

// explicit work list: trees may be nested deeper than the call stack allows
const destroyTree = (root: Value): void => {
  const pending: Array<Value> = [root]
  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    if (next._tag === "Object") {
      for (const child of next.entries.values()) {
        owners.delete(child)
        pending.push(child)
      }
      next.entries.clear()
      keySnapshots.delete(next)
    } else if (next._tag === "Array") {
      for (const child of next.elements) {
        owners.delete(child)
        pending.push(child)
      }
      next.elements.length = 0
    }
  }
}

const releaseChild = (child: Value): void => {
  owners.delete(child)
  destroyTree(child)
}

const detachFromOwner = (value: Value): void => {
  const owner = owners.get(value)
  if (owner === undefined) {
    return
  }
  owners.delete(value)
  if (owner._tag === "Array") {
    const index = owner.elements.indexOf(value)
    if (index >= 0) {
      owner.elements.splice(index, 1)
    }
    return
  }
  for (const [key, child] of owner.entries) {
    if (child === value) {
      owner.entries.delete(key)
      keySnapshots.delete(owner)
      return
    }
  }
}

/**
 * Recursively release a tree.
 *
 * Every descendant container is emptied and its ownership record dropped.
 * A value that is still attached to a parent is removed from it first.
 * Passing `undefined` is a no-op.
 *
 * @pure false
 * @complexity O(n)
 */
export const destroy = (value: Value | undefined): void => {
  if (value === undefined) {
    return
  }
  detachFromOwner(value)
  destroyTree(value)
}

/**
 * Deep copy sharing no container with the source.
 *
 * @pure true
 * @invariant equals(duplicate(v), v)
 * @complexity O(n)
 */
export const duplicate = (value: Value): Value => {
  switch (value._tag) {
    case "Null":
      return makeNull()
    case "Boolean":
      return makeBoolean(value.value)
    case "Number":
      return makeNumber(value.value)
    case "String":
      return makeString(value.value)
    case "Object": {
      const copy = makeObject()
      for (const [key, child] of value.entries) {
        setItem(copy, key, duplicate(child))
      }
      return copy
    }
    case "Array": {
      const copy = makeArray()
      for (const child of value.elements) {
        appendItem(copy, duplicate(child))
      }
      return copy
    }
  }
}

/**
 * Structural equality. Numbers compare by value, object key order is ignored.
 *
 * @pure true
 * @complexity O(n)
 */
export const equals = (left: Value, right: Value): boolean => {
  if (left === right) {
    return true
  }
  switch (left._tag) {
    case "Null":
      return right._tag === "Null"
    case "Boolean":
      return right._tag === "Boolean" && left.value === right.value
    case "Number":
      return right._tag === "Number" && left.value === right.value
    case "String":
      return right._tag === "String" && left.value === right.value
    case "Object": {
      if (right._tag !== "Object" || left.entries.size !== right.entries.size) {
        return false
      }
      for (const [key, child] of left.entries) {
        const other = right.entries.get(key)
        if (other === undefined || !equals(child, other)) {
          return false
        }
      }
      return true
    }
    case "Array": {
      if (right._tag !== "Array" || left.elements.length !== right.elements.length) {
        return false
      }
      const others = right.elements
      return left.elements.every((child, index) => {
        const other = others[index]
        return other !== undefined && equals(child, other)
      })
    }
  }
}

// Object operations

/**
 * Store `value` under `key`, taking ownership of it. A previous value under
 * the same key is destroyed.
 *
 * Returns `false` and takes no ownership when `target` is not an object,
 * `value` is missing, `value` already has an owner, or inserting it would
 * create a cycle.
 *
 * @pure false
 * @complexity O(depth)
 */
export const setItem = (target: Value, key: string, value: Value | undefined): boolean => {
  if (target._tag !== "Object" || value === undefined || !canAdopt(target, value)) {
    return false
  }
  const previous = target.entries.get(key)
  target.entries.set(key, value)
  owners.set(value, target)
  if (previous === undefined) {
    keySnapshots.delete(target)
  } else {
    releaseChild(previous)
  }
  return true
}

/**
 * Borrow the value stored under `key`. The reference is valid until the next
 * mutation of `target`.
 */
export const getItem = (target: Value, key: string): Option.Option<Value> =>
  target._tag === "Object" ? Option.fromNullable(target.entries.get(key)) : Option.none()

export const keyExists = (target: Value, key: string): boolean =>
  target._tag === "Object" && target.entries.has(key)

/**
 * Remove and destroy the value under `key`. Returns whether a value was removed.
 */
export const deleteItem = (target: Value, key: string): boolean => {
  if (target._tag !== "Object") {
    return false
  }
  const previous = target.entries.get(key)
  if (previous === undefined) {
    return false
  }
  target.entries.delete(key)
  keySnapshots.delete(target)
  releaseChild(previous)
  return true
}

export const keys = (target: Value): ReadonlyArray<string> =>
  target._tag === "Object" ? Array.from(target.entries.keys()) : []

export const size = (target: Value): number => target._tag === "Object" ? target.entries.size : 0

export type ObjectCursor = number

export const initialCursor: ObjectCursor = 0

const keySnapshotOf = (target: ObjectValue): ReadonlyArray<string> => {
  const cached = keySnapshots.get(target)
  if (cached !== undefined && cached.length === target.entries.size) {
    return cached
  }
  const fresh = Array.from(target.entries.keys())
  keySnapshots.set(target, fresh)
  return fresh
}

export interface KeyStep {
  readonly key: string
  readonly cursor: ObjectCursor
}

/**
 * Stateless key iteration. Start from {@link initialCursor} and feed each
 * returned cursor back in until `None`. Order is the map's order and is not
 * stable across mutation.
 *
 * @pure true
 * @complexity O(1) per step; O(n) on the first step after the key set changes
 */
export const nextKey = (target: Value, cursor: ObjectCursor): Option.Option<KeyStep> => {
  if (target._tag !== "Object" || cursor < 0 || !Number.isInteger(cursor)) {
    return Option.none()
  }
  const snapshot = keySnapshotOf(target)
  return Option.map(Option.fromNullable(snapshot[cursor]), (key) => ({ key, cursor: cursor + 1 }))
}

// Array operations

/**
 * Append `value`, taking ownership of it. Same refusal rules as {@link setItem}.
 *
 * @pure false
 * @complexity amortized O(1) + O(depth)
 */
export const appendItem = (target: Value, value: Value | undefined): boolean => {
  if (target._tag !== "Array" || value === undefined || !canAdopt(target, value)) {
    return false
  }
  target.elements.push(value)
  owners.set(value, target)
  return true
}

/**
 * Replace the element at `index`, or append when `index === length`.
 * Any other index is refused. The replaced element is destroyed.
 */
export const setElement = (target: Value, index: number, value: Value | undefined): boolean => {
  if (target._tag !== "Array" || !Number.isInteger(index) || index < 0) {
    return false
  }
  if (index === target.elements.length) {
    return appendItem(target, value)
  }
  const previous = target.elements[index]
  if (previous === undefined || value === undefined || !canAdopt(target, value)) {
    return false
  }
  target.elements[index] = value
  owners.set(value, target)
  releaseChild(previous)
  return true
}

/**
 * Borrow the element at `index`. The reference is valid until the next
 * mutation of `target`.
 */
export const getElement = (target: Value, index: number): Option.Option<Value> =>
  target._tag === "Array" ? Option.fromNullable(target.elements[index]) : Option.none()

export const length = (target: Value): number => target._tag === "Array" ? target.elements.length : 0

export const indexExists = (target: Value, index: number): boolean => Option.isSome(getElement(target, index))
