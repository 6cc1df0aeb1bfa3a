import { RenderedCommand } from '../templates/command-template';
import { Target } from '../targets/target.types';
import { CommandHandle, CommandOutcome } from './command-outcome';
import { ExecutionIdentity } from './execution-identity';

export interface DispatchOptions {
  identity?: ExecutionIdentity;
  /** Upper bound the target side may enforce on the process itself. */
  deadlineMs?: number;
}

/**
 * Asynchronous command channel to one target.
 *
 * dispatch() never waits for the command; it throws DispatchError when the target cannot
 * take new work. poll() suspends until the command is terminal or the timeout elapses and
 * then returns TimedOut instead of throwing; the handle stays valid and may be polled again.
 * Polling a terminal handle is an idempotent read.
 */
export abstract class RemoteExecutionClient {
  abstract dispatch(
    target: Target,
    command: RenderedCommand,
    options?: DispatchOptions,
  ): Promise<CommandHandle>;

  abstract poll(handle: CommandHandle, timeoutMs: number): Promise<CommandOutcome>;
}
