import { TargetLock, TargetLockResult } from '../../src/locks/target-lock';

export class InMemoryTargetLock extends TargetLock {
  readonly held = new Map<string, string>();
  acquisitions = 0;
  releases = 0;
  /** tryAcquire rejects with the error mapped to a target id. */
  readonly failures = new Map<string, Error>();
  releaseError: Error | null = null;

  async tryAcquire(targetId: string, runId: string): Promise<TargetLockResult> {
    const failure = this.failures.get(targetId);
    if (failure) throw failure;
    const holder = this.held.get(targetId);
    if (holder !== undefined) return { acquired: false, holder, release: async () => {} };

    this.acquisitions++;
    this.held.set(targetId, runId);
    return {
      acquired: true,
      holder: null,
      release: async () => {
        this.releases++;
        this.held.delete(targetId);
        if (this.releaseError) throw this.releaseError;
      },
    };
  }
}
