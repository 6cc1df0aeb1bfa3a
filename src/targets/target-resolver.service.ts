import { Injectable } from '@nestjs/common';
import { FleetQuery } from './fleet-query';
import { ResolutionError } from './resolution.error';
import { labelsMatch, Target, TargetSelector } from './target.types';

// Plain code-unit order, independent of locale.
function byId(a: Target, b: Target): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Picks deployment targets out of the fleet.
 * Ties are broken by the lexicographically smallest id so repeated runs against the same
 * fleet state choose the same target. Errors are surfaced, never retried here.
 */
@Injectable()
export class TargetResolverService {
  constructor(private readonly fleet: FleetQuery) {}

  async resolve(selector: TargetSelector): Promise<Target> {
    const [target] = await this.resolveMany(selector, 1);
    return target;
  }

  /** The first `limit` live matches in id order; never empty. */
  async resolveMany(selector: TargetSelector, limit: number): Promise<Target[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }

    const candidates = await this.fleet.list(selector);
    const matching = candidates.filter((t) => labelsMatch(selector.labels, t.labels));
    if (matching.length === 0) throw new ResolutionError('NotFound', selector);

    const required = selector.liveness ?? 'alive';
    const eligible = matching.filter((t) => t.liveness === required).sort(byId);
    if (eligible.length === 0) throw new ResolutionError('NotLive', selector);

    return eligible.slice(0, limit);
  }
}
