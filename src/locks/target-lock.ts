export interface TargetLockResult {
  acquired: boolean;
  /** Run currently holding the target, when known and not acquired. */
  holder: string | null;
  release: () => Promise<void>;
}

/** One deployment run per target at a time. */
export abstract class TargetLock {
  abstract tryAcquire(targetId: string, runId: string): Promise<TargetLockResult>;
}
