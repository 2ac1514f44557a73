import type { Bitboard, Square } from './chessTypes';

export const EMPTY_BITBOARD: Bitboard = 0n;

export function squareBit(square: Square): Bitboard {
  return 1n << BigInt(square);
}

export function bitboardOf(...squares: Square[]): Bitboard {
  let bb = EMPTY_BITBOARD;
  for (const sq of squares) bb |= squareBit(sq);
  return bb;
}

/** Squares set in `bb`, ascending (a1 first). */
export function bitboardSquares(bb: Bitboard): Square[] {
  const out: Square[] = [];
  for (let sq = 0; sq < 64; sq++) {
    if ((bb & squareBit(sq)) !== 0n) out.push(sq);
  }
  return out;
}

export function popCount(bb: Bitboard): number {
  return bitboardSquares(bb).length;
}

export function intersects(a: Bitboard, b: Bitboard): boolean {
  return (a & b) !== 0n;
}
