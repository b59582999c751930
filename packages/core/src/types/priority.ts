/** Single uppercase ASCII letter, `A` being the most important */
export type Priority =
  | 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G' | 'H' | 'I' | 'J' | 'K' | 'L' | 'M'
  | 'N' | 'O' | 'P' | 'Q' | 'R' | 'S' | 'T' | 'U' | 'V' | 'W' | 'X' | 'Y' | 'Z';

const PRIORITY_RE = /^[A-Z]$/;

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && PRIORITY_RE.test(value);
}
