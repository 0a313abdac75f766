/**
 * Scoped logging.
 *
 * Lines are prefixed with `[powser:<scope>]`. Debug lines are written only
 * while `config.debug` is on; warnings are always written.
 *
 * @example
 * ```typescript
 * const log = createLogger("series");
 * log.debug(`tied knot for ${name}`);
 * ```
 */

import { config } from "./config.js";
import { writeScoped } from "./writer.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  warn(message: string): void;
}

export function createLogger(scope: string): Logger {
  return {
    scope,
    debug(message) {
      if (config.isDebug()) {
        writeScoped(scope, message);
      }
    },
    warn(message) {
      writeScoped(scope, `warning: ${message}`);
    },
  };
}
