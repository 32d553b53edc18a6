import { expect } from 'chai';
import { InvalidStateError } from '../../../src/server/preview/errors.js';
import { TRANSITIONS, assertTransition, canTransition } from '../../../src/server/preview/lifecycle.js';
import { PREVIEW_STATUSES } from '../../../src/server/preview/types.js';

describe('lifecycle', () => {
  it('should allow every listed transition', () => {
    for (const from of PREVIEW_STATUSES) {
      for (const to of TRANSITIONS[from]) {
        expect(canTransition(from, to), `${from} -> ${to}`).to.equal(true);
      }
    }
  });

  it('should reject transitions that are not listed', () => {
    expect(canTransition('active', 'failed')).to.equal(false);
    expect(canTransition('failed', 'active')).to.equal(false);
    expect(canTransition('deleting', 'active')).to.equal(false);
    expect(canTransition('creating', 'extending')).to.equal(false);
  });

  it('should throw InvalidStateError for a rejected transition', () => {
    expect(() => assertTransition('deleting', 'active')).to.throw(InvalidStateError, "Cannot move preview from 'deleting' to 'active'");
  });
});
