import { invalidInput } from "@toto-sim/core-errors";
import { NumberSet, TOTO_RULES, TotoRules } from "./types";

/**
 * Validates a ticket and returns it sorted ascending. Input order is
 * irrelevant; duplicates, non-integers and out-of-range values are rejected.
 */
export function toNumberSet(values: readonly unknown[], rules: TotoRules = TOTO_RULES): NumberSet {
  if (!Array.isArray(values) || values.length !== rules.picks) {
    throw invalidInput(`Toto: exactly ${rules.picks} numbers are required`, { count: Array.isArray(values) ? values.length : 0 });
  }

  const numbers: number[] = [];
  for (const value of values) {
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw invalidInput("Toto: numbers must be integers", { value: String(value) });
    }
    if (value < rules.minNumber || value > rules.maxNumber) {
      throw invalidInput(`Toto: numbers must be between ${rules.minNumber} and ${rules.maxNumber}`, { value });
    }
    numbers.push(value);
  }

  if (new Set(numbers).size !== numbers.length) {
    throw invalidInput("Toto: numbers must be unique", { numbers });
  }

  return numbers.sort((a, b) => a - b);
}
