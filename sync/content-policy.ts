// Version prefix followed by a long base58/bech32-ish body
export const ADDRESS_REGEXP = /([13]|bc1)[a-zA-Z0-9]{30,}/;

/**
 * Returns a finding when the translation carries something that looks like a
 * payment address. Translators must never inject those into UI strings.
 */
export function findAddress(text: string | null): string | null {
  if (text === null || !ADDRESS_REGEXP.test(text)) return null;
  return `Translation "${text}" contains a cryptocurrency address. This will be removed.`;
}
