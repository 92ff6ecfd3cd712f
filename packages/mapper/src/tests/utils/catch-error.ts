/**
 * Runs fn and returns what it threw. Fails the test when nothing is thrown.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error("Expected function to throw")
}
