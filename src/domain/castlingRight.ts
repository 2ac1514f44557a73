import { assertNever } from './assertNever';
import type { Bitboard, CastleSide, Color, Square } from './chessTypes';
import { A1, A8, C1, C8, G1, G8, H1, H8 } from './square';

/**
 * One castling privilege. The tag doubles as its textual representation;
 * the FEN letter is `rightCharacter`.
 */
export type Right = 'WhiteKingside' | 'WhiteQueenside' | 'BlackKingside' | 'BlackQueenside';

/** Canonical order, matching FEN output (K, Q, k, q). */
export const ALL_RIGHTS: readonly Right[] = ['WhiteKingside', 'WhiteQueenside', 'BlackKingside', 'BlackQueenside'];

// f1 + g1, and b1 + c1 + d1. Black's masks are the same squares on rank 8.
const KINGSIDE_EMPTY: Bitboard = 0b01100000n;
const QUEENSIDE_EMPTY: Bitboard = 0b00001110n;

export function makeRight(color: Color, side: CastleSide): Right {
  if (color === 'w') return side === 'k' ? 'WhiteKingside' : 'WhiteQueenside';
  return side === 'k' ? 'BlackKingside' : 'BlackQueenside';
}

export function parseRight(ch: string): Right | null {
  switch (ch) {
    case 'K':
      return 'WhiteKingside';
    case 'Q':
      return 'WhiteQueenside';
    case 'k':
      return 'BlackKingside';
    case 'q':
      return 'BlackQueenside';
    default:
      return null;
  }
}

export function rightColor(right: Right): Color {
  switch (right) {
    case 'WhiteKingside':
    case 'WhiteQueenside':
      return 'w';
    case 'BlackKingside':
    case 'BlackQueenside':
      return 'b';
    default:
      return assertNever(right);
  }
}

export function rightSide(right: Right): CastleSide {
  switch (right) {
    case 'WhiteKingside':
    case 'BlackKingside':
      return 'k';
    case 'WhiteQueenside':
    case 'BlackQueenside':
      return 'q';
    default:
      return assertNever(right);
  }
}

/** Same side, different color. */
export function withColor(right: Right, color: Color): Right {
  return makeRight(color, rightSide(right));
}

/** Same color, different side. */
export function withSide(right: Right, side: CastleSide): Right {
  return makeRight(rightColor(right), side);
}

/** Squares between king and rook that must be vacant for the castle. */
export function rightEmptySquares(right: Right): Bitboard {
  switch (right) {
    case 'WhiteKingside':
      return KINGSIDE_EMPTY;
    case 'WhiteQueenside':
      return QUEENSIDE_EMPTY;
    case 'BlackKingside':
      return KINGSIDE_EMPTY << 56n;
    case 'BlackQueenside':
      return QUEENSIDE_EMPTY << 56n;
    default:
      return assertNever(right);
  }
}

/** Where the king lands. */
export function rightCastleSquare(right: Right): Square {
  switch (right) {
    case 'WhiteKingside':
      return G1;
    case 'WhiteQueenside':
      return C1;
    case 'BlackKingside':
      return G8;
    case 'BlackQueenside':
      return C8;
    default:
      return assertNever(right);
  }
}

/** Home square of the rook the right belongs to. */
export function rightRookSquare(right: Right): Square {
  switch (right) {
    case 'WhiteKingside':
      return H1;
    case 'WhiteQueenside':
      return A1;
    case 'BlackKingside':
      return H8;
    case 'BlackQueenside':
      return A8;
    default:
      return assertNever(right);
  }
}

export function rightForRookSquare(square: Square): Right | null {
  return ALL_RIGHTS.find((r) => rightRookSquare(r) === square) ?? null;
}

export function rightCharacter(right: Right): 'K' | 'Q' | 'k' | 'q' {
  switch (right) {
    case 'WhiteKingside':
      return 'K';
    case 'WhiteQueenside':
      return 'Q';
    case 'BlackKingside':
      return 'k';
    case 'BlackQueenside':
      return 'q';
    default:
      return assertNever(right);
  }
}

/**
 * Bit flag of a right inside `CastlingRights`. Each right owns a distinct bit.
 * @internal
 */
export function rightBit(right: Right): number {
  switch (right) {
    case 'WhiteKingside':
      return 0b0001;
    case 'WhiteQueenside':
      return 0b0010;
    case 'BlackKingside':
      return 0b0100;
    case 'BlackQueenside':
      return 0b1000;
    default:
      return assertNever(right);
  }
}
