import { describe, it, expect } from "vitest";
import { InvalidLengthError } from "../errors.js";
import { MAX_LENGTH } from "./constants.js";
import {
  buildIdentificationRules,
  canHaveAsIdentificationLength,
  isValidIdentification,
} from "./identification.js";

describe("isValidIdentification (default rules)", () => {
  it("accepts a capital letter followed by one or two digits", () => {
    expect(isValidIdentification("A1")).toBe(true);
    expect(isValidIdentification("N12")).toBe(true);
  });

  it("rejects lengths other than 2 and 3", () => {
    expect(isValidIdentification("A")).toBe(false);
    expect(isValidIdentification("A123")).toBe(false);
    expect(isValidIdentification("")).toBe(false);
  });

  it("requires a leading capital letter", () => {
    expect(isValidIdentification("a1")).toBe(false);
    expect(isValidIdentification("11")).toBe(false);
  });

  it("only allows digits after the first character", () => {
    expect(isValidIdentification("AB")).toBe(false);
    expect(isValidIdentification("A-1")).toBe(false);
  });
});

describe("buildIdentificationRules", () => {
  it("adds extra lengths without duplicating the defaults", () => {
    const rules = buildIdentificationRules([3, 5]);
    expect(rules.lengths).toEqual([2, 3, 5]);
  });

  it("adds every character of each extra string", () => {
    const rules = buildIdentificationRules([4], ["-", "XY"]);
    expect(isValidIdentification("A-X1", rules)).toBe(true);
    expect(isValidIdentification("AY-9", rules)).toBe(true);
    expect(isValidIdentification("AZ19", rules)).toBe(false);
  });

  it("rejects lengths outside (0, MAX_LENGTH)", () => {
    expect(() => buildIdentificationRules([0])).toThrow(InvalidLengthError);
    expect(() => buildIdentificationRules([-3])).toThrow(InvalidLengthError);
    expect(() => buildIdentificationRules([MAX_LENGTH])).toThrow(InvalidLengthError);
  });
});

describe("canHaveAsIdentificationLength", () => {
  it("accepts positive integers below MAX_LENGTH", () => {
    expect(canHaveAsIdentificationLength(1)).toBe(true);
    expect(canHaveAsIdentificationLength(MAX_LENGTH - 1)).toBe(true);
    expect(canHaveAsIdentificationLength(2.5)).toBe(false);
  });
});
