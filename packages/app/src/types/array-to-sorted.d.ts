// CHANGE: ES2023 Array.prototype.toSorted typings on top of the ES2022 lib
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: toSorted does not mutate the original array
// COMPLEXITY: O(n log n)

interface Array<T> {
  toSorted(compareFn?: (left: T, right: T) => number): Array<T>
}

interface ReadonlyArray<T> {
  toSorted(compareFn?: (left: T, right: T) => number): Array<T>
}
