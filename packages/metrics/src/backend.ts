const BACKEND_SUFFIX = "-backend";

/**
 * The backend binary shares this code but must never report itself as a
 * user-typed command. Identity is a plain suffix match on the invocation path.
 */
export function isInvokedAsCliBackend(argv0: string = process.argv[1] ?? process.argv0): boolean {
  return argv0.endsWith(BACKEND_SUFFIX);
}
