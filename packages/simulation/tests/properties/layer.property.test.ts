/**
 * Property Tests for the Excess-of-Loss layer
 * ===========================================
 *
 * Critical Invariants:
 * 1. retained + ceded = gross (conservation)
 * 2. 0 ≤ ceded ≤ limit
 * 3. ceded is non-decreasing in gross
 * 4. zero retention cedes min(G, L); an unlimited layer cedes max(0, G − R)
 * 5. per-claim basis: ceded ≤ claims · L
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import { ExcessOfLossLayer } from '../../src/reinsurance/layer.js';

const amount = fc.double({ min: 0, max: 1e9, noNaN: true });
const limit = fc.oneof(amount, fc.constant(Infinity));

describe('ExcessOfLossLayer - Property Tests', () => {
  it('conserves the gross loss', () => {
    fc.assert(
      fc.property(amount, limit, amount, (retention, l, gross) => {
        const { ceded, retained } = new ExcessOfLossLayer({ retention, limit: l }).cede(gross);
        return Math.abs(ceded + retained - gross) <= 1e-9 * Math.max(1, gross);
      })
    );
  });

  it('keeps the cession within [0, limit]', () => {
    fc.assert(
      fc.property(amount, limit, amount, (retention, l, gross) => {
        const { ceded } = new ExcessOfLossLayer({ retention, limit: l }).cede(gross);
        return ceded >= 0 && ceded <= l;
      })
    );
  });

  it('cedes nothing on a zero loss', () => {
    fc.assert(
      fc.property(amount, limit, (retention, l) => {
        return new ExcessOfLossLayer({ retention, limit: l }).cede(0).ceded === 0;
      })
    );
  });

  it('is monotone in the gross loss', () => {
    fc.assert(
      fc.property(amount, limit, amount, amount, (retention, l, a, b) => {
        const layer = new ExcessOfLossLayer({ retention, limit: l });
        const [lo, hi] = a <= b ? [a, b] : [b, a];
        return layer.cede(lo).ceded <= layer.cede(hi).ceded;
      })
    );
  });

  it('cedes min(G, L) without a retention', () => {
    fc.assert(
      fc.property(limit, amount, (l, gross) => {
        return new ExcessOfLossLayer({ retention: 0, limit: l }).cede(gross).ceded === Math.min(gross, l);
      })
    );
  });

  it('cedes max(0, G − R) when unlimited', () => {
    fc.assert(
      fc.property(amount, amount, (retention, gross) => {
        const { ceded } = new ExcessOfLossLayer({ retention, limit: Infinity }).cede(gross);
        return ceded === Math.max(0, gross - retention);
      })
    );
  });

  it('never cedes more per claim than the claims themselves', () => {
    fc.assert(
      fc.property(amount, limit, fc.array(amount, { maxLength: 20 }), (retention, l, claims) => {
        const split = new ExcessOfLossLayer({ retention, limit: l, basis: 'per-claim' }).cedeClaims(
          claims
        );
        return split.ceded >= 0 && split.ceded <= split.gross && split.retained >= 0;
      })
    );
  });

  it('caps each claim, not the trial, on a per-claim basis', () => {
    fc.assert(
      fc.property(amount, amount, fc.array(amount, { maxLength: 20 }), (retention, l, claims) => {
        const layer = new ExcessOfLossLayer({ retention, limit: l, basis: 'per-claim' });
        const { ceded } = layer.cedeClaims(claims);
        return ceded <= claims.length * l * (1 + 1e-12);
      })
    );
  });
});
