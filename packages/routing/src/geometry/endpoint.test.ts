import { describe, it, expect } from "vitest";
import { formatLocation, isSameEndpointPair, isSameLocation, isValidLocation } from "./endpoint.js";

describe("isSameLocation", () => {
  it("compares both components exactly", () => {
    expect(isSameLocation({ lat: 1, lng: 2 }, { lat: 1, lng: 2 })).toBe(true);
    expect(isSameLocation({ lat: 1, lng: 2 }, { lat: 2, lng: 1 })).toBe(false);
    expect(isSameLocation({ lat: 1, lng: 2 }, { lat: 1, lng: 2.0000001 })).toBe(false);
  });
});

describe("isValidLocation", () => {
  it("accepts the bounds inclusively", () => {
    expect(isValidLocation({ lat: 0, lng: 0 })).toBe(true);
    expect(isValidLocation({ lat: 70, lng: 70 })).toBe(true);
  });

  it("rejects components outside [0, 70]", () => {
    expect(isValidLocation({ lat: -0.5, lng: 10 })).toBe(false);
    expect(isValidLocation({ lat: 10, lng: 70.1 })).toBe(false);
  });
});

describe("isSameEndpointPair", () => {
  const a = { lat: 1, lng: 1 };
  const b = { lat: 2, lng: 2 };
  const c = { lat: 3, lng: 3 };

  it("ignores order", () => {
    expect(isSameEndpointPair([a, b], [b, a])).toBe(true);
    expect(isSameEndpointPair([a, b], [a, b])).toBe(true);
  });

  it("rejects pairs sharing a single location", () => {
    expect(isSameEndpointPair([a, b], [a, c])).toBe(false);
  });
});

describe("formatLocation", () => {
  it("prints lat and lng in parentheses", () => {
    expect(formatLocation({ lat: 12.5, lng: 3 })).toBe("(12.5,3)");
  });
});
