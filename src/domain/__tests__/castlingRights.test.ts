import { ALL_RIGHTS } from '../castlingRight';
import type { Right } from '../castlingRight';
import { CastlingRights } from '../castlingRights';

function allSubsets(): Right[][] {
  const out: Right[][] = [];
  for (let mask = 0; mask < 16; mask++) {
    out.push(ALL_RIGHTS.filter((_, i) => (mask & (1 << i)) !== 0));
  }
  return out;
}

describe('CastlingRights text', () => {
  it('prints "-" for no rights and parses it back', () => {
    expect(CastlingRights.empty().toString()).toBe('-');
    const parsed = CastlingRights.parse('-');
    expect(parsed).not.toBeNull();
    expect(parsed?.isEmpty).toBe(true);
  });

  it('prints members sorted by character code', () => {
    expect(CastlingRights.all.toString()).toBe('KQkq');
    expect(CastlingRights.from(['BlackQueenside', 'WhiteKingside']).toString()).toBe('Kq');
    expect(CastlingRights.from(['BlackKingside', 'WhiteQueenside']).toString()).toBe('Qk');
  });

  it('round-trips every subset', () => {
    for (const subset of allSubsets()) {
      const rights = CastlingRights.from(subset);
      const parsed = CastlingRights.parse(rights.toString());
      expect(parsed).not.toBeNull();
      expect(parsed?.equals(rights)).toBe(true);
    }
  });

  it('accepts letters in any order and ignores repeats', () => {
    expect(CastlingRights.parse('qkQK')?.toString()).toBe('KQkq');
    expect(CastlingRights.parse('KQkqK')?.toString()).toBe('KQkq');
  });

  it('rejects empty input and any unknown character', () => {
    expect(CastlingRights.parse('')).toBeNull();
    expect(CastlingRights.parse('x')).toBeNull();
    expect(CastlingRights.parse('KQx')).toBeNull();
    expect(CastlingRights.parse('K-')).toBeNull();
    expect(CastlingRights.parse('KQ')?.toString()).toBe('KQ');
  });

  it('reports why a field was rejected', () => {
    expect(CastlingRights.tryParse('')).toEqual({ ok: false, error: 'Castling rights must be a non-empty string' });
    expect(CastlingRights.tryParse('KQx')).toEqual({ ok: false, error: 'Invalid castling rights "KQx"' });
    const r = CastlingRights.tryParse('kq');
    expect(r.ok).toBe(true);
    if (r.ok) expect(r.value.toArray()).toEqual(['BlackKingside', 'BlackQueenside']);
  });

  it('serializes to the FEN field in JSON', () => {
    expect(JSON.stringify({ castling: CastlingRights.from(['WhiteKingside']) })).toBe('{"castling":"K"}');
  });
});

describe('CastlingRights algebra', () => {
  const white = CastlingRights.forColor('w');
  const kingside = CastlingRights.from(['WhiteKingside', 'BlackKingside']);

  it('computes union, intersection and symmetric difference', () => {
    expect(white.union(kingside).toString()).toBe('KQk');
    expect(white.intersect(kingside).toString()).toBe('K');
    expect(white.exclusiveOr(kingside).toString()).toBe('Qk');
    expect(white.subtract(kingside).toString()).toBe('Q');
  });

  it('leaves operands untouched in the pure variants', () => {
    white.union(kingside);
    expect(white.toString()).toBe('KQ');
    expect(kingside.toString()).toBe('Kk');
  });

  it('mutates the receiver in the in-place variants', () => {
    const a = white.clone().unionInPlace(kingside);
    expect(a.toString()).toBe('KQk');

    const b = white.clone();
    b.intersectInPlace(kingside);
    expect(b.toString()).toBe('K');

    const c = white.clone();
    c.exclusiveOrInPlace(kingside);
    expect(c.toString()).toBe('Qk');

    const d = white.clone();
    d.subtractInPlace(kingside);
    expect(d.toString()).toBe('Q');
  });

  it('satisfies the basic set laws for every pair of subsets', () => {
    const sets = allSubsets().map((s) => CastlingRights.from(s));
    const empty = CastlingRights.empty();
    for (const a of sets) {
      expect(a.union(a).equals(a)).toBe(true);
      expect(a.intersect(a).equals(a)).toBe(true);
      expect(a.exclusiveOr(a).isEmpty).toBe(true);
      expect(a.union(empty).equals(a)).toBe(true);
      for (const b of sets) {
        expect(a.union(b).equals(b.union(a))).toBe(true);
        expect(a.intersect(b).equals(b.intersect(a))).toBe(true);
        expect(a.intersect(b).isSubsetOf(a)).toBe(true);
        expect(a.subtract(b).isDisjointWith(b)).toBe(true);
      }
    }
  });

  it('is associative under union', () => {
    const a = CastlingRights.from(['WhiteKingside']);
    const b = CastlingRights.from(['WhiteQueenside', 'BlackKingside']);
    const c = CastlingRights.from(['BlackKingside', 'BlackQueenside']);
    expect(a.union(b).union(c).equals(a.union(b.union(c)))).toBe(true);
  });
});

describe('CastlingRights membership', () => {
  it('inserts idempotently', () => {
    const rights = CastlingRights.empty();
    rights.insert('BlackQueenside').insert('BlackQueenside');
    expect(rights.size).toBe(1);
    expect(rights.contains('BlackQueenside')).toBe(true);
  });

  it('returns the removed right, or null when absent', () => {
    const rights = CastlingRights.from(['WhiteKingside']);
    expect(rights.remove('WhiteKingside')).toBe('WhiteKingside');
    expect(rights.remove('WhiteKingside')).toBeNull();
    expect(rights.isEmpty).toBe(true);
  });

  it('never contains a right after removing it', () => {
    for (const subset of allSubsets()) {
      for (const r of ALL_RIGHTS) {
        const rights = CastlingRights.from(subset);
        rights.remove(r);
        expect(rights.contains(r)).toBe(false);
        expect(rights.intersect(CastlingRights.from([r])).isEmpty).toBe(true);
      }
    }
  });

  it('drops both rights of a color', () => {
    const rights = CastlingRights.all;
    expect(rights.removeColor('b')).toEqual(['BlackKingside', 'BlackQueenside']);
    expect(rights.toString()).toBe('KQ');
    expect(rights.removeColor('b')).toEqual([]);
  });

  it('hands out a fresh "all" set each time', () => {
    const a = CastlingRights.all;
    a.remove('WhiteKingside');
    expect(CastlingRights.all.toString()).toBe('KQkq');
  });

  it('reaches "kq" after white gives up both rights', () => {
    const rights = CastlingRights.all;
    rights.remove('WhiteKingside');
    expect(rights.contains('WhiteKingside')).toBe(false);
    expect(rights.contains('WhiteQueenside')).toBe(true);
    rights.remove('WhiteQueenside');
    expect(rights.toString()).toBe('kq');
  });
});

describe('CastlingRights equality and iteration', () => {
  it('compares by members, not insertion history', () => {
    const a = CastlingRights.empty().insert('BlackKingside').insert('WhiteQueenside');
    const b = CastlingRights.empty().insert('WhiteQueenside').insert('BlackKingside');
    expect(a.equals(b)).toBe(true);
    expect(a.hashCode()).toBe(b.hashCode());
    expect(a.hashCode()).toBe(0b0110);
  });

  it('hashes into four bits', () => {
    expect(CastlingRights.empty().hashCode()).toBe(0);
    expect(CastlingRights.all.hashCode()).toBe(15);
  });

  it('yields each member once, and restarts on every traversal', () => {
    const rights = CastlingRights.from(['BlackQueenside', 'WhiteKingside', 'BlackQueenside']);
    expect([...rights]).toEqual(['WhiteKingside', 'BlackQueenside']);
    expect([...rights]).toEqual(['WhiteKingside', 'BlackQueenside']);
  });

  it('converts to and from boolean flags', () => {
    const flags = { wK: true, wQ: false, bK: false, bQ: true };
    const rights = CastlingRights.fromFlags(flags);
    expect(rights.toString()).toBe('Kq');
    expect(rights.toFlags()).toEqual(flags);
  });
});
