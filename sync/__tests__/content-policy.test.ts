import { describe, it, expect } from "vitest";
import { findAddress } from "../content-policy";
import { LEGACY_ADDRESS, SEGWIT_ADDRESS } from "./fixtures";

describe("findAddress", () => {
  it("flags address-shaped content", () => {
    const text = `send to ${LEGACY_ADDRESS} now`;
    expect(findAddress(text)).toBe(
      `Translation "${text}" contains a cryptocurrency address. This will be removed.`,
    );
    expect(findAddress(`pay ${SEGWIT_ADDRESS}`)).not.toBeNull();
  });

  it("ignores ordinary text and short numbers", () => {
    expect(findAddress("Sent %1 of %2")).toBeNull();
    expect(findAddress("Block 1234567890")).toBeNull();
    expect(findAddress(null)).toBeNull();
  });

  it("needs at least 30 characters after the prefix", () => {
    expect(findAddress(`3${"a".repeat(29)}`)).toBeNull();
    expect(findAddress(`3${"a".repeat(30)}`)).not.toBeNull();
  });
});
