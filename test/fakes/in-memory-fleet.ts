import { FleetQuery } from '../../src/targets/fleet-query';
import { Liveness, Target, TargetSelector } from '../../src/targets/target.types';

export function target(
  id: string,
  labels: Record<string, string>,
  liveness: Liveness = 'alive',
): Target {
  return { id, liveness, labels };
}

/**
 * Returns every target of the current snapshot without filtering, so the resolver's own
 * matching is what tests observe. Each list() call advances to the next snapshot; the last
 * one repeats.
 */
export class InMemoryFleetQuery extends FleetQuery {
  readonly calls: TargetSelector[] = [];
  private readonly snapshots: Target[][];

  constructor(...snapshots: Target[][]) {
    super();
    this.snapshots = snapshots.length > 0 ? snapshots : [[]];
  }

  async list(selector: TargetSelector): Promise<Target[]> {
    const snapshot = this.snapshots[Math.min(this.calls.length, this.snapshots.length - 1)];
    this.calls.push(selector);
    return snapshot.map((t) => ({ ...t, labels: { ...t.labels } }));
  }
}
