// Format specifiers come in two conventions:
// - numeric (Qt `%1`..`%9`): substituted by position, any order
// - others (printf `%s`, `%d`, `%n`): substituted in sequence, order matters

export type SpecifierProfile = {
  numeric: Set<string>;
  other: string[];
};

export type CheckResult = { valid: boolean; errors: string[] };

const NUMERIC_SPECIFIERS = new Set(["1", "2", "3", "4", "5", "6", "7", "8", "9"]);

/** A `%` with nothing after it. */
export class FormatParseError extends Error {
  constructor(readonly text: string) {
    super(`Dangling '%' at end of "${sanitizeString(text)}"`);
    this.name = "FormatParseError";
  }
}

/** The source string itself is malformed; fix the source, not the translation. */
export class SourceFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SourceFormatError";
  }
}

export function findFormatSpecifiers(s: string): string[] {
  const specifiers: string[] = [];
  let pos = 0;
  for (;;) {
    const percent = s.indexOf("%", pos);
    if (percent < 0) break;
    const next = s.codePointAt(percent + 1);
    if (next === undefined) throw new FormatParseError(s);
    const specifier = String.fromCodePoint(next);
    specifiers.push(specifier);
    pos = percent + 1 + specifier.length;
  }
  return specifiers;
}

export function splitFormatSpecifiers(specifiers: string[]): SpecifierProfile {
  const numeric = new Set<string>();
  const other: string[] = [];
  for (const s of specifiers) {
    if (NUMERIC_SPECIFIERS.has(s)) numeric.add(s);
    else other.push(s);
  }

  // Qt only substitutes the numeric ones, so "(percentage: %1%)" is fine as
  // written and '%)' must not be read as a printf specifier.
  if (numeric.size > 0) return { numeric, other: [] };
  return { numeric, other };
}

export function profileOf(s: string): SpecifierProfile {
  return splitFormatSpecifiers(findFormatSpecifiers(s));
}

/** Profile of `s`, or null when it cannot be parsed. */
export function tryProfileOf(s: string): SpecifierProfile | null {
  try {
    return profileOf(s);
  } catch (err) {
    if (err instanceof FormatParseError) return null;
    throw err;
  }
}

export function profilesEqual(a: SpecifierProfile, b: SpecifierProfile) {
  if (a.numeric.size !== b.numeric.size) return false;
  for (const n of a.numeric) if (!b.numeric.has(n)) return false;
  return (
    a.other.length === b.other.length &&
    a.other.every((s, i) => s === b.other[i])
  );
}

export function assertSourceProfile(source: string, profile: SpecifierProfile) {
  if (profile.numeric.size > 0 && profile.other.length > 0) {
    throw new SourceFormatError(
      `Source mixes Qt and printf format specifiers: '${sanitizeString(source)}'`,
    );
  }
}

/** Profile of a source string; any defect in it is fatal. */
export function sourceProfileOf(source: string): SpecifierProfile {
  let profile: SpecifierProfile;
  try {
    profile = profileOf(source);
  } catch (err) {
    if (err instanceof FormatParseError) {
      throw new SourceFormatError(
        `Parse error in source message: '${sanitizeString(source)}'`,
      );
    }
    throw err;
  }
  assertSourceProfile(source, profile);
  return profile;
}

export function sanitizeString(s: string): string {
  return s.replace(/\n/g, " ");
}

function isBareCountProfile(p: SpecifierProfile) {
  return p.numeric.size === 0 && p.other.length === 1 && p.other[0] === "n";
}

function isEmptyProfile(p: SpecifierProfile) {
  return p.numeric.size === 0 && p.other.length === 0;
}

export function checkFormatSpecifiers(
  source: string,
  translation: string,
  numerus: boolean,
): CheckResult {
  const sourceProfile = sourceProfileOf(source);
  const translationProfile = tryProfileOf(translation);
  if (!translationProfile) {
    return {
      valid: false,
      errors: [
        `Parse error in translation for '${sanitizeString(source)}': '${sanitizeString(translation)}'`,
      ],
    };
  }

  if (profilesEqual(sourceProfile, translationProfile)) {
    return { valid: true, errors: [] };
  }

  // Plural forms may drop %n, usually when the form covers a single count
  if (
    numerus &&
    isBareCountProfile(sourceProfile) &&
    isEmptyProfile(translationProfile) &&
    !translation.includes("%")
  ) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: [
      `Mismatch between '${sanitizeString(source)}' and '${sanitizeString(translation)}'`,
    ],
  };
}
