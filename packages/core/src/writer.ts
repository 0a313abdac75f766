/**
 * The sink every log line goes to. Shared by the loggers and by config,
 * which has to report problems before any logger can consult it.
 */

/** Sink for rendered log lines */
export type LogWriter = (line: string) => void;

const defaultWriter: LogWriter = (line) => console.error(line);

let writer: LogWriter = defaultWriter;

/**
 * Replace the sink every logger writes to.
 */
export function setLogWriter(w: LogWriter): void {
  writer = w;
}

/**
 * Restore the default sink (stderr).
 */
export function resetLogWriter(): void {
  writer = defaultWriter;
}

/**
 * Write `[powser:<scope>] message`.
 */
export function writeScoped(scope: string, message: string): void {
  writer(`[powser:${scope}] ${message}`);
}
