// src/utils/text.ts

/**
 * Upper-case the first letter of every letter run and lower-case the rest:
 * "arcadia hs" -> "Arcadia Hs", "o'neill" -> "O'Neill".
 */
export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => {
    return before + letter.toUpperCase();
  });
}
