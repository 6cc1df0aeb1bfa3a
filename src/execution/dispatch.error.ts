export type DispatchFailure = 'TargetUnreachable';

/** The target could not accept a new command at send time. */
export class DispatchError extends Error {
  override readonly name = 'DispatchError';
  readonly kind: DispatchFailure = 'TargetUnreachable';

  constructor(readonly targetId: string) {
    super(`Target ${targetId} cannot accept commands`);
  }
}
