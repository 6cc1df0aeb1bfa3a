export type Liveness = 'alive' | 'unreachable' | 'unknown';

export const LIVENESS_STATES: readonly Liveness[] = ['alive', 'unreachable', 'unknown'];

/** One addressable compute instance, as discovered for the current run. */
export interface Target {
  readonly id: string;
  readonly liveness: Liveness;
  readonly labels: Readonly<Record<string, string>>;
}

/**
 * Label-equality predicate plus the liveness a target must be in to be chosen.
 * liveness defaults to 'alive'.
 */
export interface TargetSelector {
  labels: Record<string, string>;
  liveness?: Liveness;
}

export function labelsMatch(
  wanted: Readonly<Record<string, string>>,
  actual: Readonly<Record<string, string>>,
): boolean {
  return Object.entries(wanted).every(
    ([key, value]) => Object.prototype.hasOwnProperty.call(actual, key) && actual[key] === value,
  );
}

export function describeSelector(selector: TargetSelector): string {
  const labels = Object.keys(selector.labels)
    .sort()
    .map((key) => `${key}=${selector.labels[key]}`)
    .join(',');
  return `{${labels}} (${selector.liveness ?? 'alive'})`;
}
