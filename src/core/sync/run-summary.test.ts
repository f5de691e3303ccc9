import { describe, it, expect } from 'vitest';
import { createRunSummary, summaryExitCode } from './run-summary';

function clock(...times: number[]) {
  let index = 0;
  return () => times[Math.min(index++, times.length - 1)];
}

describe('createRunSummary', () => {
  it('should count actions and transfer outcomes', () => {
    const summary = createRunSummary(clock(1000, 3500));

    summary.recordAction({ type: 'skip', path: 'a.zip' });
    summary.recordAction({ type: 'already-exists', path: 'b.zip' });
    summary.recordAction({ type: 'download', path: 'c.zip' });
    summary.recordAction({ type: 'download', path: 'd.zip' });
    summary.recordAction({ type: 'download', path: 'e.zip' });
    summary.recordTransfer({ path: 'c.zip', outcome: { status: 'success' }, attempts: 1, bytes: 10 });
    summary.recordTransfer({
      path: 'd.zip',
      outcome: { status: 'retried', retries: 2 },
      attempts: 3,
      bytes: 20,
    });
    summary.recordTransfer({
      path: 'e.zip',
      outcome: { status: 'failed', reason: 'HTTP 404', terminal: true },
      attempts: 1,
      bytes: 0,
    });

    expect(summary.finish()).toEqual({
      downloaded: 2,
      retried: 1,
      failed: 1,
      skipped: 1,
      alreadyPresent: 1,
      bytesTransferred: 30,
      excludedDirectories: 0,
      failedPaths: ['e.zip'],
      unreachable: [],
      orphans: [],
      diskFull: false,
      cancelled: false,
      durationMs: 2500,
    });
  });

  it('should keep failed paths sorted', () => {
    const summary = createRunSummary();
    for (const path of ['z.bin', 'a.bin']) {
      summary.recordTransfer({
        path,
        outcome: { status: 'failed', reason: 'HTTP 503', terminal: false },
        attempts: 4,
        bytes: 0,
      });
    }

    expect(summary.finish().failedPaths).toEqual(['a.bin', 'z.bin']);
  });

  it('should report failures for unreachable subtrees', () => {
    const summary = createRunSummary();
    expect(summaryExitCode(summary.finish())).toBe(0);

    summary.recordUnreachable([{ path: 'b', reason: 'HTTP 404', attempts: 1 }]);

    expect(summaryExitCode(summary.finish())).toBe(1);
    expect(summary.finish().unreachable).toEqual([{ path: 'b', reason: 'HTTP 404', attempts: 1 }]);
  });

  it('should carry flags, orphans and excluded directory counts', () => {
    const summary = createRunSummary();
    summary.setExcludedDirectories(2);
    summary.setOrphans(['old.bin']);
    summary.markDiskFull();
    summary.markCancelled();

    const result = summary.finish();

    expect(result.excludedDirectories).toBe(2);
    expect(result.orphans).toEqual(['old.bin']);
    expect(result.diskFull).toBe(true);
    expect(result.cancelled).toBe(true);
  });
});

describe('summaryExitCode', () => {
  const clean = createRunSummary().finish();

  it('should be zero for a clean run', () => {
    expect(summaryExitCode(clean)).toBe(0);
  });

  it('should be zero when only skips and orphans were reported', () => {
    expect(summaryExitCode({ ...clean, skipped: 4, orphans: ['old.bin'] })).toBe(0);
  });

  it('should be nonzero for failures, unreachable subtrees or cancellation', () => {
    expect(summaryExitCode({ ...clean, failed: 1 })).toBe(1);
    expect(
      summaryExitCode({ ...clean, unreachable: [{ path: 'b', reason: 'x', attempts: 1 }] }),
    ).toBe(1);
    expect(summaryExitCode({ ...clean, cancelled: true })).toBe(1);
  });
});
