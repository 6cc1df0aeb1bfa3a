import { Target, TargetSelector } from './target.types';

/**
 * Fleet lookup boundary: every target carrying the selector's labels, liveness computed fresh.
 * Implementations must be idempotent and free of side effects.
 */
export abstract class FleetQuery {
  abstract list(selector: TargetSelector): Promise<Target[]>;
}
