/**
 * Road identification format rules.
 *
 * An identification is a capital letter followed by characters from an
 * allowed set (digits by default), with a total length drawn from an
 * allowed set (2 or 3 by default). Networks can widen both sets.
 */

import type { IdentificationRules } from "@roadnet/types";
import { InvalidLengthError } from "../errors.js";
import { MAX_LENGTH } from "./constants.js";

const DEFAULT_LENGTHS = [2, 3];
const DIGITS = "0123456789".split("");

/** Whether an allowed identification length is itself in range */
export function canHaveAsIdentificationLength(length: number): boolean {
  return Number.isInteger(length) && length > 0 && length < MAX_LENGTH;
}

/**
 * Build identification rules from the defaults plus extra lengths and characters.
 *
 * @throws InvalidLengthError if an extra length is not a positive integer below MAX_LENGTH
 */
export function buildIdentificationRules(
  extraLengths: number[] = [],
  extraCharacters: string[] = [],
): IdentificationRules {
  const lengths = [...DEFAULT_LENGTHS];
  for (const length of extraLengths) {
    if (!canHaveAsIdentificationLength(length)) {
      throw new InvalidLengthError(length);
    }
    if (!lengths.includes(length)) lengths.push(length);
  }

  const allowedCharacters = new Set(DIGITS);
  for (const chars of extraCharacters) {
    // Accept "AB" as shorthand for ["A", "B"]
    for (const c of chars) allowedCharacters.add(c);
  }

  return { lengths, allowedCharacters };
}

export const DEFAULT_IDENTIFICATION_RULES: IdentificationRules = buildIdentificationRules();

export function isValidIdentification(
  identification: string,
  rules: IdentificationRules = DEFAULT_IDENTIFICATION_RULES,
): boolean {
  const chars = [...identification];
  if (!rules.lengths.includes(chars.length)) return false;

  const [first, ...rest] = chars;
  if (first === undefined || first < "A" || first > "Z") return false;

  return rest.every((c) => rules.allowedCharacters.has(c));
}
