import { Inject, Injectable } from '@nestjs/common';
import { rolloutConfig, RolloutConfig } from '../config/rollout.config';

/**
 * Credential used to authenticate dispatches. Acquired once per run and read-only for
 * the run's duration.
 */
export interface ExecutionIdentity {
  readonly principal: string;
  readonly acquiredAt: Date;
}

export abstract class ExecutionIdentityProvider {
  abstract acquire(): Promise<ExecutionIdentity>;
}

@Injectable()
export class ConfiguredIdentityProvider extends ExecutionIdentityProvider {
  constructor(@Inject(rolloutConfig.KEY) private readonly config: RolloutConfig) {
    super();
  }

  async acquire(): Promise<ExecutionIdentity> {
    return Object.freeze({ principal: this.config.executionPrincipal, acquiredAt: new Date() });
  }
}
