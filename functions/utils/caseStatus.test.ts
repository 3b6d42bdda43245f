import { describe, it, expect } from 'vitest';

import { ALL_STATUSES, CaseStatus, assertTransition, canTransition, isCaseStatus, isTransient } from './caseStatus.js';
import { InvalidTransitionError } from './errors.js';

describe('caseStatus', () => {
  it('should allow only the forward and rollback edges', () => {
    const allowed = ALL_STATUSES.flatMap(from =>
      ALL_STATUSES.filter(to => canTransition(from, to)).map(to => `${from} -> ${to}`),
    );

    expect(allowed).toEqual([
      'Ready for Download -> Downloading',
      'Downloading -> Ready for Download',
      'Downloading -> Uploading',
      'Uploading -> Ready for Download',
      'Uploading -> Uploaded',
    ]);
  });

  it('should treat Uploaded as terminal', () => {
    for (const to of ALL_STATUSES) {
      expect(canTransition(CaseStatus.Uploaded, to)).toBe(false);
    }
  });

  it('should reject skipping straight from Ready to Uploading', () => {
    expect(() => assertTransition(CaseStatus.Ready, CaseStatus.Uploading)).toThrow(InvalidTransitionError);
    expect(() => assertTransition(CaseStatus.Ready, CaseStatus.Uploading)).toThrow(
      'Invalid status transition: Ready for Download -> Uploading',
    );
  });

  it('should recognise status labels exactly', () => {
    expect(isCaseStatus('Ready for Download')).toBe(true);
    expect(isCaseStatus('ready for download')).toBe(false);
    expect(isCaseStatus('Archived')).toBe(false);
  });

  it('should mark only Downloading and Uploading as transient', () => {
    expect(ALL_STATUSES.filter(isTransient)).toEqual([CaseStatus.Downloading, CaseStatus.Uploading]);
  });
});
