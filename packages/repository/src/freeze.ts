/**
 * Deep freeze for parsed repository records.
 */

/**
 * Freezes an object graph in place and returns the same reference.
 * Walks with an explicit stack; already-frozen nodes are not revisited,
 * which also makes cycles safe.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object") {
    return value;
  }

  const pending: object[] = [value];
  while (pending.length > 0) {
    const next = pending.pop();
    if (next === undefined || Object.isFrozen(next)) {
      continue;
    }
    Object.freeze(next);
    for (const child of Object.values(next)) {
      if (child !== null && typeof child === "object") {
        pending.push(child);
      }
    }
  }
  return value;
}
