import type { Square } from './chessTypes';

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export type FileIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;
export type RankIndex = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

// Squares the castling tables refer to.
export const A1: Square = 0;
export const C1: Square = 2;
export const E1: Square = 4;
export const G1: Square = 6;
export const H1: Square = 7;
export const A8: Square = 56;
export const C8: Square = 58;
export const E8: Square = 60;
export const G8: Square = 62;
export const H8: Square = 63;

export function isSquare(x: unknown): x is Square {
  return typeof x === 'number' && Number.isInteger(x) && x >= 0 && x < 64;
}

export function fileOf(square: Square): FileIndex {
  return (square % 8) as FileIndex;
}

export function rankOf(square: Square): RankIndex {
  return Math.floor(square / 8) as RankIndex;
}

export function makeSquare(file: number, rank: number): Square | null {
  if (!Number.isInteger(file) || !Number.isInteger(rank)) return null;
  if (file < 0 || file > 7 || rank < 0 || rank > 7) return null;
  return rank * 8 + file;
}

export function toAlgebraic(square: Square): string {
  return `${FILES[fileOf(square)]}${rankOf(square) + 1}`;
}

export function parseAlgebraicSquare(text: string): Square | null {
  const t = text.trim().toLowerCase();
  if (t.length !== 2) return null;

  const f = FILES.findIndex((file) => file === t[0]);
  const r = Number(t[1]);
  if (f < 0) return null;
  if (!Number.isInteger(r) || r < 1 || r > 8) return null;
  return makeSquare(f, r - 1);
}
