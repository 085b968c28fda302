import { describe, it, expect } from "vitest";
import {
  FormatParseError,
  SourceFormatError,
  assertSourceProfile,
  checkFormatSpecifiers,
  findFormatSpecifiers,
  profileOf,
  profilesEqual,
  splitFormatSpecifiers,
  tryProfileOf,
} from "../specifiers";

describe("findFormatSpecifiers", () => {
  it("returns nothing for strings without a marker", () => {
    expect(findFormatSpecifiers("Open wallet")).toEqual([]);
    expect(findFormatSpecifiers("")).toEqual([]);
  });

  it("records the character after each marker and skips past it", () => {
    expect(findFormatSpecifiers("%1 of %2 (%s)")).toEqual(["1", "2", "s"]);
    expect(findFormatSpecifiers("100%% done")).toEqual(["%"]);
  });

  it("takes whole code points", () => {
    expect(findFormatSpecifiers("%😀%s")).toEqual(["😀", "s"]);
  });

  it("throws on a dangling marker", () => {
    expect(() => findFormatSpecifiers("Progress 100%")).toThrow(
      FormatParseError,
    );
  });
});

describe("splitFormatSpecifiers", () => {
  it("keeps printf specifiers in order", () => {
    const p = splitFormatSpecifiers(["s", "d", "s"]);
    expect([...p.numeric]).toEqual([]);
    expect(p.other).toEqual(["s", "d", "s"]);
  });

  it("collects numeric specifiers as a set", () => {
    const p = splitFormatSpecifiers(["2", "1", "2"]);
    expect([...p.numeric].sort()).toEqual(["1", "2"]);
    expect(p.other).toEqual([]);
  });

  it("drops the others once a numeric specifier is present", () => {
    const p = profileOf("(percentage: %1%)");
    expect([...p.numeric]).toEqual(["1"]);
    expect(p.other).toEqual([]);

    const mixed = profileOf("%s then %1 then %d");
    expect([...mixed.numeric]).toEqual(["1"]);
    expect(mixed.other).toEqual([]);
  });

  it("does not count 0 as numeric", () => {
    expect(profileOf("%0").other).toEqual(["0"]);
  });
});

describe("profilesEqual", () => {
  it("ignores numeric order but not printf order", () => {
    expect(profilesEqual(profileOf("%1 %2"), profileOf("%2 %1"))).toBe(true);
    expect(profilesEqual(profileOf("%s %d"), profileOf("%d %s"))).toBe(false);
    expect(profilesEqual(profileOf("%1"), profileOf("%1 %2"))).toBe(false);
  });
});

describe("tryProfileOf", () => {
  it("returns null for a malformed string", () => {
    expect(tryProfileOf("50%")).toBeNull();
    expect(tryProfileOf("50%s")?.other).toEqual(["s"]);
  });
});

describe("assertSourceProfile", () => {
  it("rejects a profile mixing both conventions", () => {
    expect(() =>
      assertSourceProfile("x", { numeric: new Set(["1"]), other: ["s"] }),
    ).toThrow(SourceFormatError);
  });
});

describe("checkFormatSpecifiers", () => {
  it("accepts reordered positional specifiers", () => {
    expect(checkFormatSpecifiers("Sent %1 of %2", "%2: %1 gesendet", false)).toEqual({
      valid: true,
      errors: [],
    });
  });

  it("reports printf specifiers in the wrong order", () => {
    expect(checkFormatSpecifiers("%s then %d", "%d then %s", false)).toEqual({
      valid: false,
      errors: ["Mismatch between '%s then %d' and '%d then %s'"],
    });
  });

  it("reports a parse error with newlines flattened", () => {
    expect(checkFormatSpecifiers("Load\n%1", "Lade %", false)).toEqual({
      valid: false,
      errors: ["Parse error in translation for 'Load %1': 'Lade %'"],
    });
  });

  it("lets plural forms drop the count", () => {
    expect(checkFormatSpecifiers("%n hour(s)", "one hour", true).valid).toBe(
      true,
    );
    expect(checkFormatSpecifiers("%n hour(s)", "one hour", false).valid).toBe(
      false,
    );
  });

  it("does not exempt a plural form that still has a marker", () => {
    expect(checkFormatSpecifiers("%n hour(s)", "100% hour", true)).toEqual({
      valid: false,
      errors: ["Mismatch between '%n hour(s)' and '100% hour'"],
    });
  });

  it("only exempts a bare %n source", () => {
    expect(checkFormatSpecifiers("%n of %s", "nothing", true).valid).toBe(false);
  });

  it("treats a malformed source as fatal", () => {
    expect(() => checkFormatSpecifiers("50%", "50 %", false)).toThrow(
      SourceFormatError,
    );
  });
});
