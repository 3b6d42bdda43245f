import { describe, it, expect, vi } from 'vitest';

import { resetStuckCases } from './resetStuckCases.js';
import { CaseStatus } from './utils/caseStatus.js';
import { RecordUpdateError } from './utils/errors.js';
import type { CaseRecord } from './utils/types.js';

function stuck(id: string, status: CaseStatus): CaseRecord {
  return { id, status, title: id, suspectName: id, linkSlots: [], credentials: '', sharedLink: null };
}

describe('resetStuckCases', () => {
  it('should put Downloading and Uploading cases back to Ready', async () => {
    const byStatus: Partial<Record<CaseStatus, CaseRecord[]>> = {
      [CaseStatus.Downloading]: [stuck('a', CaseStatus.Downloading)],
      [CaseStatus.Uploading]: [stuck('b', CaseStatus.Uploading), stuck('c', CaseStatus.Uploading)],
    };
    const source = {
      findByStatus: vi.fn(async (status: CaseStatus) => byStatus[status] ?? []),
      setStatus: vi.fn(async (id: string, _status: CaseStatus) => {
        if (id === 'c') throw new RecordUpdateError(id, 'Updating status on c failed: conflict');
      }),
    };

    const result = await resetStuckCases(source, 5);

    expect(result).toEqual({ reset: ['a', 'b'], failed: ['c'] });
    expect(source.findByStatus.mock.calls).toEqual([
      [CaseStatus.Downloading, 5],
      [CaseStatus.Uploading, 5],
    ]);
    expect(source.setStatus).toHaveBeenCalledWith('a', CaseStatus.Ready);
  });
});
