import createDebug from 'debug';
import type { Debugger } from 'debug';

const ROOT_NAMESPACE = 'qasm-bridge';

export type Logger = Debugger;

/**
 * Create a namespaced debug logger.
 *
 * Output is off unless enabled, e.g. `DEBUG=qasm-bridge:*`.
 */
export function createLogger(scope: string): Logger {
  return createDebug(`${ROOT_NAMESPACE}:${scope}`);
}
