import type { Color } from './chessTypes';

export const COLORS: readonly Color[] = ['w', 'b'];

export function isWhite(c: Color): boolean {
  return c === 'w';
}

export function isBlack(c: Color): boolean {
  return c === 'b';
}

/** Lowercase FEN character: 'w' or 'b'. */
export function colorCharacter(c: Color): string {
  return c;
}

export function colorName(c: Color): 'White' | 'Black' {
  return c === 'w' ? 'White' : 'Black';
}

/** Accepts a single character of either case. */
export function parseColor(text: string): Color | null {
  if (text === 'W' || text === 'w') return 'w';
  if (text === 'B' || text === 'b') return 'b';
  return null;
}

export function oppositeColor(c: Color): Color {
  return c === 'w' ? 'b' : 'w';
}

/**
 * Flips the side to move of whatever owns it (a position, a game record...).
 * Colors themselves are primitive values, so inverting "in place" happens on the owner.
 */
export function invertSideToMove(holder: { sideToMove: Color }): void {
  holder.sideToMove = oppositeColor(holder.sideToMove);
}
