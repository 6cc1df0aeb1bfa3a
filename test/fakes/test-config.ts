import { join } from 'node:path';
import { RolloutConfig } from '../../src/config/rollout.config';

export const TEMPLATE_DIR = join(__dirname, '..', '..', 'templates');

/** Small timeouts and no backoff worth waiting for. */
export function testConfig(overrides: Partial<RolloutConfig> = {}): RolloutConfig {
  return {
    pollIntervalMs: 5,
    heartbeatTimeoutSeconds: 30,
    resolveAttempts: 1,
    resolveBackoffMs: 1,
    stageRetries: 0,
    stageRetryBackoffMs: 1,
    maxOutputBytes: 1024,
    deployPath: '/opt/app',
    containerName: 'app',
    hostPort: 80,
    containerPort: 8080,
    healthPath: '/health',
    healthAttempts: 3,
    healthIntervalSeconds: 1,
    credentialsRef: '/etc/rollout/docker',
    executionPrincipal: 'test-principal',
    templateDir: TEMPLATE_DIR,
    stageTimeoutsMs: {
      DependencyCheck: 1000,
      ArtifactPull: 1000,
      DeploySwap: 1000,
      HealthCheck: 1000,
    },
    ...overrides,
  };
}
