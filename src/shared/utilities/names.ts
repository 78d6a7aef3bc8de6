/**
 * Case-insensitive key of a character name. Full Unicode lowercasing, so
 * names outside ASCII fold the same way in queries and in memory.
 */
export function foldName(name: string): string {
  return name.toLowerCase();
}
