import { describeSelector, TargetSelector } from './target.types';

export type ResolutionFailure = 'NotFound' | 'NotLive';

/**
 * No target could be chosen for a selector. NotFound: nothing carries the labels.
 * NotLive: something does, but not in the required liveness state.
 */
export class ResolutionError extends Error {
  override readonly name = 'ResolutionError';

  constructor(
    readonly kind: ResolutionFailure,
    readonly selector: TargetSelector,
  ) {
    super(
      kind === 'NotFound'
        ? `No target matches ${describeSelector(selector)}`
        : `Targets match ${describeSelector(selector)} but none is ${selector.liveness ?? 'alive'}`,
    );
  }
}
