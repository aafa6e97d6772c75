const TERMINATORS = [".", "!", "?", "\n"] as const;

function lastBefore(text: string, needle: string, position: number): number {
  if (position <= 0) return -1;
  return text.lastIndexOf(needle, position - 1);
}

/**
 * The sentence around `position`: from just after the nearest terminator to
 * the left up to and including the nearest terminator at or after it.
 * Text boundaries stand in when no terminator exists on a side.
 */
export function findContainingSentence(text: string, position: number): string {
  const left = Math.max(...TERMINATORS.map((t) => lastBefore(text, t, position)));
  const start = left >= 0 ? left + 1 : 0;

  const right = TERMINATORS.map((t) => text.indexOf(t, position)).filter((i) => i !== -1);
  const end = right.length > 0 ? Math.min(...right) + 1 : text.length;

  return text.slice(start, end).trim();
}
