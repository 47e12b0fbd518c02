/** The slice of `console` the engine writes to. Tests pass spies instead. */
export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function timestamp(date: Date = new Date()): string {
  return date.toLocaleTimeString();
}
