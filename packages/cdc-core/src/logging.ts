// Debug logging for CDC sessions.
//
// Uses DEBUG environment variable pattern matching (like npm's debug package).
// Output goes to stderr so it never mixes with decoded records on stdout.

/**
 * Check if a namespace is enabled based on the DEBUG pattern.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug = process.env.DEBUG): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * A namespaced logger. Calls are no-ops unless the namespace is enabled.
 *
 * To enable logging:
 * ```sh
 * DEBUG='cdc:*' cdc-client db.table       # everything
 * DEBUG='cdc:decoder' cdc-client db.table # idle/retry decisions only
 * DEBUG='cdc:*,-cdc:tcp' cdc-client ...   # all but socket events
 * ```
 *
 * The DEBUG variable is read on every call, so it can change at runtime.
 */
export class Logger {
  constructor(readonly namespace: string) {}

  get enabled(): boolean {
    return isEnabled(this.namespace);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled) return;
    if (data === undefined) {
      console.error(`${this.namespace} ${message}`);
    } else {
      console.error(`${this.namespace} ${message}`, data);
    }
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}
