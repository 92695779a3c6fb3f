import { TreeDefect } from "./errors.js"
import type { ContainerRef, NodeRef, Ref, TreeNode } from "./node.js"
import { sameRef } from "./node.js"

// CHANGE: intrusive tree surgery over handle links (append, detach, post-order delete)
// FORMAT THEOREM: ∀p,c: insertEndChild(p,c); unlink(p,c) restores p's child list
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a detached node has parent = prev = next = null before its slot is released
// COMPLEXITY: O(1) append/unlink, O(subtree) delete

/** Access to the nodes behind handles, plus returning slots to their pools. */
export interface NodeStore {
  readonly resolve: (ref: Ref) => TreeNode
  readonly release: (ref: NodeRef) => void
  readonly track: (ref: NodeRef) => void
}

/**
 * Append `child` at the end of `parent`'s child list.
 *
 * @pure false
 * @invariant child was not attached anywhere before the call
 * @complexity O(1)
 */
export const insertEndChild = (store: NodeStore, parent: ContainerRef, child: NodeRef): void => {
  const parentNode = store.resolve(parent)
  const childNode = store.resolve(child)
  if (childNode.links.parent !== null) {
    throw new TreeDefect({ message: `${child.kind} node ${child.index} already has a parent` })
  }
  const last = parentNode.links.lastChild
  if (last === null) {
    parentNode.links.firstChild = child
    childNode.links.prev = null
  } else {
    store.resolve(last).links.next = child
    childNode.links.prev = last
  }
  parentNode.links.lastChild = child
  childNode.links.next = null
  childNode.links.parent = parent
  store.track(child)
}

export const unlink = (store: NodeStore, parent: ContainerRef, child: NodeRef): void => {
  const childNode = store.resolve(child)
  if (!sameRef(childNode.links.parent, parent)) {
    throw new TreeDefect({
      message: `${child.kind} node ${child.index} is not a child of ${parent.kind} node ${parent.index}`
    })
  }
  const parentNode = store.resolve(parent)
  const { next, prev } = childNode.links
  if (sameRef(parentNode.links.firstChild, child)) {
    parentNode.links.firstChild = next
  }
  if (sameRef(parentNode.links.lastChild, child)) {
    parentNode.links.lastChild = prev
  }
  if (prev !== null) {
    store.resolve(prev).links.next = next
  }
  if (next !== null) {
    store.resolve(next).links.prev = prev
  }
  childNode.links.parent = null
  childNode.links.prev = null
  childNode.links.next = null
}

/**
 * Free every descendant of `ref`, children before their parents.
 *
 * @pure false
 * @invariant afterwards firstChild = lastChild = null
 * @complexity O(n) where n = subtree size
 */
export const deleteChildren = (store: NodeStore, ref: ContainerRef): void => {
  const node = store.resolve(ref)
  for (let first = node.links.firstChild; first !== null; first = node.links.firstChild) {
    deleteNode(store, first)
  }
  node.links.firstChild = null
  node.links.lastChild = null
}

/**
 * Detach `ref` from its parent, if any, and free it with its whole subtree.
 * Descends through first children on an explicit path, so depth costs heap, not stack.
 *
 * @pure false
 * @invariant every node is unlinked before its slot is released
 * @complexity O(n) where n = subtree size
 */
export const deleteNode = (store: NodeStore, ref: NodeRef): void => {
  const path: Array<NodeRef> = []
  let current: NodeRef | undefined = ref
  while (current !== undefined) {
    const node = store.resolve(current)
    const first = node.links.firstChild
    if (first === null) {
      const parent = node.links.parent
      if (parent !== null) {
        unlink(store, parent, current)
      }
      store.release(current)
      current = path.pop()
    } else {
      path.push(current)
      current = first
    }
  }
}

export const childRefs = (store: NodeStore, ref: Ref): ReadonlyArray<NodeRef> => {
  const result: Array<NodeRef> = []
  let current = store.resolve(ref).links.firstChild
  while (current !== null) {
    result.push(current)
    current = store.resolve(current).links.next
  }
  return result
}
