/**
 * Database entities: targets, remote_commands, deployment_runs, target_locks.
 */
export { TargetRow } from './target.entity';
export { RemoteCommand } from './remote-command.entity';
export { DeploymentRunRow } from './deployment-run.entity';
export { TargetLockRow } from './target-lock.entity';

import { TargetRow } from './target.entity';
import { RemoteCommand } from './remote-command.entity';
import { DeploymentRunRow } from './deployment-run.entity';
import { TargetLockRow } from './target-lock.entity';

export const ENTITIES = [TargetRow, RemoteCommand, DeploymentRunRow, TargetLockRow];
