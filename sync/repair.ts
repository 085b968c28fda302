import {
  type SpecifierProfile,
  profilesEqual,
  sourceProfileOf,
  tryProfileOf,
} from "./specifiers";

// Common translator slips around a specifier, rewritten in this order
const SUBSTITUTIONS: ReadonlyArray<[string, string]> = [
  ["% 1", "%1"],
  ["1%", "%1"],
  ["$1", "%1"],
  ["2%", "%2"],
  ["% s", "%s"],
  ["s%", "%s"],
  ["$s", "%s"],
  ["n%", "%n"],
  ["$n", "%n"],
  ["% n", "%n"],
  ["% d", "%d"],
];

// A specifier preceded by one of these is already separated from its word
const SEPARATED_SPECIFIER = [" %", "(%", "'%", '"%'];

export type RepairStepName = "substitution" | "marker-swap" | "plural-swap";

export type RepairOutcome =
  | { fixed: true; text: string; step: RepairStepName }
  | { fixed: false };

export type RepairContext = {
  source: string;
  sourceProfile: SpecifierProfile;
  insertSpacing: boolean;
};

/** Returns the repaired text, or null when the step does not apply or does not help. */
export type RepairStep = (ctx: RepairContext, candidate: string) => string | null;

export function fixString(s: string): string {
  return SUBSTITUTIONS.reduce((acc, [from, to]) => acc.replaceAll(from, to), s);
}

export function spaceSpecifiers(s: string): string {
  if (s.startsWith("%") || SEPARATED_SPECIFIER.some((p) => s.includes(p))) {
    return s;
  }
  return s.replaceAll("%", " %");
}

function matchesSource(ctx: RepairContext, candidate: string) {
  const profile = tryProfileOf(candidate);
  return profile !== null && profilesEqual(ctx.sourceProfile, profile);
}

export const substitutionStep: RepairStep = (ctx, candidate) => {
  if (!matchesSource(ctx, candidate)) return null;
  return ctx.insertSpacing ? spaceSpecifiers(candidate) : candidate;
};

// Translator typed the printf marker where the source has an accelerator '&'
export const markerSwapStep: RepairStep = (ctx, candidate) => {
  if (!candidate.includes("%") || !ctx.source.includes("&")) return null;
  const swapped = candidate.replaceAll("%", "&");
  return matchesSource(ctx, swapped) ? swapped : null;
};

// Translator used a Qt positional where the source has the plural count
export const pluralSwapStep: RepairStep = (ctx, candidate) => {
  if (!candidate.includes("%1") || !ctx.source.includes("%n")) return null;
  const swapped = candidate.replaceAll("%1", "%n");
  return matchesSource(ctx, swapped) ? swapped : null;
};

export const REPAIR_STEPS: ReadonlyArray<[RepairStepName, RepairStep]> = [
  ["substitution", substitutionStep],
  ["marker-swap", markerSwapStep],
  ["plural-swap", pluralSwapStep],
];

export function repairTranslation(
  source: string,
  translation: string,
  { insertSpacing = true }: { insertSpacing?: boolean } = {},
): RepairOutcome {
  const ctx: RepairContext = {
    source,
    sourceProfile: sourceProfileOf(source),
    insertSpacing,
  };
  const candidate = fixString(translation);
  for (const [step, apply] of REPAIR_STEPS) {
    const text = apply(ctx, candidate);
    if (text !== null) return { fixed: true, text, step };
  }
  return { fixed: false };
}
