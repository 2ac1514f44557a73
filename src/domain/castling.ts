import type { Bitboard, Piece, Square } from './chessTypes';
import { intersects } from './bitboard';
import type { Right } from './castlingRight';
import { ALL_RIGHTS, rightColor, rightEmptySquares, rightForRookSquare } from './castlingRight';
import type { CastlingRights } from './castlingRights';

/**
 * The parts of a played move that affect castling rights.
 * `captured` is the piece standing on `to` before the move, if any.
 */
export type CastlingMove = {
  piece: Piece;
  from: Square;
  to: Square;
  captured?: Piece | null;
  isCastle?: boolean;
};

/** True when nothing stands between king and rook. Attacked squares are the engine's concern. */
export function isCastlePathClear(right: Right, occupied: Bitboard): boolean {
  return !intersects(occupied, rightEmptySquares(right));
}

export function canCastle(rights: CastlingRights, right: Right, occupied: Bitboard): boolean {
  return rights.contains(right) && isCastlePathClear(right, occupied);
}

/**
 * Update `rights` in place after `move` has been played:
 * - king moves (castles included) drop both rights of that color
 * - a rook leaving its home square drops that side
 * - capturing a rook on its home square drops the opponent's side
 *
 * Returns the removed rights in canonical order.
 */
export function revokeCastlingRights(rights: CastlingRights, move: CastlingMove): Right[] {
  const removed = new Set<Right>();

  if (move.piece.type === 'k' || move.isCastle) {
    for (const r of rights.removeColor(move.piece.color)) removed.add(r);
  } else if (move.piece.type === 'r') {
    const r = rightForRookSquare(move.from);
    if (r !== null && rightColor(r) === move.piece.color && rights.remove(r) !== null) removed.add(r);
  }

  const captured = move.captured ?? null;
  if (captured && captured.type === 'r') {
    const r = rightForRookSquare(move.to);
    if (r !== null && rightColor(r) === captured.color && rights.remove(r) !== null) removed.add(r);
  }

  return ALL_RIGHTS.filter((r) => removed.has(r));
}
