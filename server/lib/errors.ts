/**
 * Pure error-classification helpers.
 *
 * Kept in lib/ so the HTTP client and the scan orchestrator can share them
 * without a lib → services cycle.
 */

function readField(err: object, key: string): unknown {
  return key in err ? Reflect.get(err, key) : undefined;
}

/**
 * Returns true if `err` represents a request abort: an AbortError or
 * TimeoutError by name, or a message containing "aborted".
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const name = String(readField(err, 'name') || '');
  const message = String(readField(err, 'message') || '');
  return name === 'AbortError' || name === 'TimeoutError' || /aborted|aborterror/i.test(message);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
