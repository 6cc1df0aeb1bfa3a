import { ExecutionIdentity, ExecutionIdentityProvider } from '../../src/execution/execution-identity';

export class FixedIdentityProvider extends ExecutionIdentityProvider {
  acquisitions = 0;
  failure: Error | null = null;

  constructor(private readonly principal = 'test-principal') {
    super();
  }

  async acquire(): Promise<ExecutionIdentity> {
    this.acquisitions++;
    if (this.failure) throw this.failure;
    return { principal: this.principal, acquiredAt: new Date(0) };
  }
}
