/**
 * Wait until every pending microtask (and the emissions they start) has run.
 */
export async function flush(): Promise<void> {
  await new Promise<void>(resolve => setTimeout(resolve, 0))
}

/**
 * A promise that stays pending until `open` is called.
 */
export function createGate(): { promise: Promise<void>; open: () => void } {
  let release = () => {}
  const promise = new Promise<void>(resolve => {
    release = () => resolve()
  })
  return { promise, open: () => release() }
}
