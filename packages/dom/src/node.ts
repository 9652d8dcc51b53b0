// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Plain-object description of an element. Renderers return these so the
 * mapping from state to view stays a pure function that can be compared
 * with `toEqual` in tests and materialised with `createElementFrom`.
 */
export interface ViewNode {
  readonly tag: string
  readonly attrs: Readonly<Record<string, string>>
  readonly children: ReadonlyArray<ViewChild>
}

/** Strings become text nodes, so they are never parsed as HTML. */
export type ViewChild = ViewNode | string

export type AttrValue = string | number | boolean | null | undefined

/** Anything `h()` accepts as a child; nil and `false` are skipped, arrays are flattened. */
export type ChildInput = ViewChild | number | null | undefined | false | ReadonlyArray<ChildInput>

// ---------------------------------------------------------------------------
// h
// ---------------------------------------------------------------------------

function normaliseAttrs(attrs: Record<string, AttrValue>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [name, value] of Object.entries(attrs)) {
    if (value === null || value === undefined || value === false) continue
    out[name] = value === true ? '' : String(value)
  }
  return out
}

function flatten(children: ReadonlyArray<ChildInput>, out: ViewChild[]): ViewChild[] {
  for (const child of children) {
    if (child === null || child === undefined || child === false) continue
    if (typeof child === 'number') out.push(String(child))
    else if (typeof child === 'string' || !isChildList(child)) out.push(child)
    else flatten(child, out)
  }
  return out
}

function isChildList(child: ViewNode | ReadonlyArray<ChildInput>): child is ReadonlyArray<ChildInput> {
  return Array.isArray(child)
}

/**
 * h(tag, attrs?, ...children)
 *
 * Builds a frozen ViewNode.
 *
 *   attrs:    null / undefined / false → omitted, true → '' (boolean attribute)
 *   children: null / undefined / false → skipped, numbers → strings, arrays → flattened
 *
 * @example
 *   h('ul', { class: 'user-list' },
 *     users.map(u => h('li', { 'data-user-id': u.id }, u.name)),
 *   )
 */
export function h(tag: string, attrs: Record<string, AttrValue> = {}, ...children: ChildInput[]): ViewNode {
  return Object.freeze({
    tag,
    attrs: Object.freeze(normaliseAttrs(attrs)),
    children: Object.freeze(flatten(children, [])),
  })
}

// ---------------------------------------------------------------------------
// Comparison / materialisation
// ---------------------------------------------------------------------------

/** Structural equality of two view trees. */
export function isSameView(a: ViewChild, b: ViewChild): boolean {
  if (a === b) return true
  if (typeof a === 'string' || typeof b === 'string') return false
  if (a.tag !== b.tag || a.children.length !== b.children.length) return false

  const aNames = Object.keys(a.attrs)
  if (aNames.length !== Object.keys(b.attrs).length) return false
  for (const name of aNames) {
    if (a.attrs[name] !== b.attrs[name]) return false
  }

  return a.children.every((child, i) => isSameView(child, b.children[i]))
}

/** Creates the DOM subtree described by `node`. */
export function createElementFrom(node: ViewNode, doc: Document = document): Element {
  const el = doc.createElement(node.tag)
  for (const [name, value] of Object.entries(node.attrs)) {
    el.setAttribute(name, value)
  }
  for (const child of node.children) {
    el.appendChild(typeof child === 'string' ? doc.createTextNode(child) : createElementFrom(child, doc))
  }
  return el
}
