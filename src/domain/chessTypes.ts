/**
 * Core chess domain types shared with the surrounding rules engine.
 *
 * Keep these types UI-agnostic. Everything here is plain data except `Bitboard`,
 * which is a bigint so all 64 bits are usable.
 */

/** Color: white ('w') or black ('b'). Matches the FEN active-color field. */
export type Color = 'w' | 'b';

/** Board side of a castle: king-side ('k') or queen-side ('q'). */
export type CastleSide = 'k' | 'q';

/**
 * Piece types are stored in lowercase, similar to FEN, but without color.
 * - p pawn
 * - n knight
 * - b bishop
 * - r rook
 * - q queen
 * - k king
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

export type Piece = {
  color: Color;
  type: PieceType;
};

/**
 * 0–63 square index.
 *
 * Convention:
 * - 0 = a1
 * - 7 = h1
 * - 8 = a2
 * - 63 = h8
 */
export type Square = number;

/** 64-bit occupancy mask, bit n = square n. */
export type Bitboard = bigint;

/**
 * Castling rights as plain booleans, for engines that keep positions JSON-serializable.
 */
export type CastlingFlags = {
  /** White king-side (K). */
  wK: boolean;
  /** White queen-side (Q). */
  wQ: boolean;
  /** Black king-side (k). */
  bK: boolean;
  /** Black queen-side (q). */
  bQ: boolean;
};
