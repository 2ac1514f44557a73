import type { CastlingFlags, Color } from './chessTypes';
import type { Right } from './castlingRight';
import { ALL_RIGHTS, parseRight, rightBit, rightCharacter, rightColor } from './castlingRight';

export type CastlingRightsParseResult =
  | { ok: true; value: CastlingRights }
  | { ok: false; error: string };

const NO_BITS = 0;
const ALL_BITS = 0b1111;

function bitsOf(rights: Iterable<Right>): number {
  let bits = NO_BITS;
  for (const r of rights) bits |= rightBit(r);
  return bits;
}

/**
 * The castling rights still available in a position: a set over the four `Right`s,
 * stored as one bit per right.
 *
 * Pure operations (`union`, `intersect`, ...) return a new set. The `...InPlace`
 * variants, `insert` and `remove` change `this`, so a position that shares its
 * rights with another snapshot should `clone()` first.
 */
export class CastlingRights implements Iterable<Right> {
  private bits: number;

  constructor(rights: Iterable<Right> = []) {
    this.bits = bitsOf(rights);
  }

  /** No rights (FEN "-"). */
  static empty(): CastlingRights {
    return new CastlingRights();
  }

  /** All four rights, as in the starting position. Always a fresh instance. */
  static get all(): CastlingRights {
    return CastlingRights.fromBits(ALL_BITS);
  }

  static from(rights: Iterable<Right>): CastlingRights {
    return new CastlingRights(rights);
  }

  static forColor(color: Color): CastlingRights {
    return new CastlingRights(ALL_RIGHTS.filter((r) => rightColor(r) === color));
  }

  static fromFlags(flags: CastlingFlags): CastlingRights {
    const rights = new CastlingRights();
    if (flags.wK) rights.insert('WhiteKingside');
    if (flags.wQ) rights.insert('WhiteQueenside');
    if (flags.bK) rights.insert('BlackKingside');
    if (flags.bQ) rights.insert('BlackQueenside');
    return rights;
  }

  /**
   * Parse a FEN castling field ("KQkq", "Kq", "-", ...).
   *
   * All-or-nothing: one unknown character rejects the whole field.
   * Repeated letters are accepted.
   */
  static tryParse(text: string): CastlingRightsParseResult {
    if (text.length === 0) return { ok: false, error: 'Castling rights must be a non-empty string' };
    if (text === '-') return { ok: true, value: new CastlingRights() };

    const rights = new CastlingRights();
    for (const ch of text) {
      const right = parseRight(ch);
      if (right === null) return { ok: false, error: `Invalid castling rights "${text}"` };
      rights.insert(right);
    }
    return { ok: true, value: rights };
  }

  /** Like `tryParse`, returning null for malformed input. */
  static parse(text: string): CastlingRights | null {
    const r = CastlingRights.tryParse(text);
    return r.ok ? r.value : null;
  }

  private static fromBits(bits: number): CastlingRights {
    const rights = new CastlingRights();
    rights.bits = bits & ALL_BITS;
    return rights;
  }

  get isEmpty(): boolean {
    return this.bits === NO_BITS;
  }

  get size(): number {
    return this.toArray().length;
  }

  contains(member: Right): boolean {
    return (this.bits & rightBit(member)) !== 0;
  }

  isSubsetOf(other: CastlingRights): boolean {
    return (this.bits & ~other.bits) === NO_BITS;
  }

  isDisjointWith(other: CastlingRights): boolean {
    return (this.bits & other.bits) === NO_BITS;
  }

  union(other: CastlingRights): CastlingRights {
    return CastlingRights.fromBits(this.bits | other.bits);
  }

  intersect(other: CastlingRights): CastlingRights {
    return CastlingRights.fromBits(this.bits & other.bits);
  }

  exclusiveOr(other: CastlingRights): CastlingRights {
    return CastlingRights.fromBits(this.bits ^ other.bits);
  }

  subtract(other: CastlingRights): CastlingRights {
    return CastlingRights.fromBits(this.bits & ~other.bits);
  }

  unionInPlace(other: CastlingRights): this {
    this.bits |= other.bits;
    return this;
  }

  intersectInPlace(other: CastlingRights): this {
    this.bits &= other.bits;
    return this;
  }

  exclusiveOrInPlace(other: CastlingRights): this {
    this.bits ^= other.bits;
    return this;
  }

  subtractInPlace(other: CastlingRights): this {
    this.bits &= ~other.bits;
    return this;
  }

  insert(member: Right): this {
    this.bits |= rightBit(member);
    return this;
  }

  /** Removes `member` and returns it, or returns null when it was not present. */
  remove(member: Right): Right | null {
    if (!this.contains(member)) return null;
    this.bits &= ~rightBit(member);
    return member;
  }

  /** Drops both rights of `color` (the king moved or castled). Returns what was removed. */
  removeColor(color: Color): Right[] {
    const removed: Right[] = [];
    for (const r of ALL_RIGHTS) {
      if (rightColor(r) === color && this.remove(r) !== null) removed.push(r);
    }
    return removed;
  }

  clone(): CastlingRights {
    return CastlingRights.fromBits(this.bits);
  }

  equals(other: CastlingRights): boolean {
    return this.bits === other.bits;
  }

  /** OR of each member's bit; equal sets always hash alike. */
  hashCode(): number {
    let hash = 0;
    for (const r of this) hash |= rightBit(r);
    return hash;
  }

  *[Symbol.iterator](): Iterator<Right> {
    // Snapshot so a traversal is stable even if the set changes mid-loop.
    const bits = this.bits;
    for (const r of ALL_RIGHTS) {
      if ((bits & rightBit(r)) !== 0) yield r;
    }
  }

  toArray(): Right[] {
    return Array.from(this);
  }

  toFlags(): CastlingFlags {
    return {
      wK: this.contains('WhiteKingside'),
      wQ: this.contains('WhiteQueenside'),
      bK: this.contains('BlackKingside'),
      bQ: this.contains('BlackQueenside')
    };
  }

  /** FEN castling field: "-" when empty, otherwise the letters sorted by character code. */
  toString(): string {
    if (this.isEmpty) return '-';
    return this.toArray().map(rightCharacter).sort().join('');
  }

  toJSON(): string {
    return this.toString();
  }
}
