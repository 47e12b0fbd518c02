import { InvalidArgumentError } from "commander";

/** Option parser for numeric flags; commander reports the error and exits with usage. */
export function parseNumber(flag: string) {
  return (value: string): number => {
    const n = Number(value);
    if (value.trim() === "" || !Number.isFinite(n)) {
      throw new InvalidArgumentError(`${flag} must be a number, got "${value}"`);
    }
    return n;
  };
}
