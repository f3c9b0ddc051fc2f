/**
 * Logging sink for notify internals.
 *
 * Defaults to the console for warnings; debug output is dropped unless a
 * logger is passed in.
 */
export type Logger = Pick<Console, `warn` | `debug`>

export const defaultLogger: Logger = {
  warn: (...args: Array<unknown>) => console.warn(...args),
  debug: () => {},
}
