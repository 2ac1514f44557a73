export type { Bitboard, CastleSide, CastlingFlags, Color, Piece, PieceType, Square } from './chessTypes';

export {
  A1,
  A8,
  C1,
  C8,
  E1,
  E8,
  FILES,
  G1,
  G8,
  H1,
  H8,
  fileOf,
  isSquare,
  makeSquare,
  parseAlgebraicSquare,
  rankOf,
  toAlgebraic
} from './square';
export type { FileIndex, RankIndex } from './square';

export { EMPTY_BITBOARD, bitboardOf, bitboardSquares, intersects, popCount, squareBit } from './bitboard';

export {
  COLORS,
  colorCharacter,
  colorName,
  invertSideToMove,
  isBlack,
  isWhite,
  oppositeColor,
  parseColor
} from './color';

export type { Right } from './castlingRight';
export {
  ALL_RIGHTS,
  makeRight,
  parseRight,
  rightCastleSquare,
  rightCharacter,
  rightColor,
  rightEmptySquares,
  rightForRookSquare,
  rightRookSquare,
  rightSide,
  withColor,
  withSide
} from './castlingRight';

export { CastlingRights } from './castlingRights';
export type { CastlingRightsParseResult } from './castlingRights';

export { canCastle, isCastlePathClear, revokeCastlingRights } from './castling';
export type { CastlingMove } from './castling';
