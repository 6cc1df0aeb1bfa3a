import { ConfigType, registerAs } from '@nestjs/config';
import { join } from 'node:path';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? Math.floor(value) : fallback;
}

function stringFromEnv(name: string, fallback: string): string {
  const raw = process.env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Deployment settings. Everything a stage template needs that is not
 * target- or run-specific comes from here.
 */
export const rolloutConfig = registerAs('rollout', () => ({
  pollIntervalMs: intFromEnv('ROLLOUT_POLL_INTERVAL_MS', 2000),
  heartbeatTimeoutSeconds: intFromEnv('ROLLOUT_HEARTBEAT_TIMEOUT_SECONDS', 30),

  resolveAttempts: Math.max(1, intFromEnv('ROLLOUT_RESOLVE_ATTEMPTS', 3)),
  resolveBackoffMs: intFromEnv('ROLLOUT_RESOLVE_BACKOFF_MS', 1000),
  stageRetries: intFromEnv('ROLLOUT_STAGE_RETRIES', 0),
  stageRetryBackoffMs: intFromEnv('ROLLOUT_STAGE_RETRY_BACKOFF_MS', 2000),

  maxOutputBytes: intFromEnv('ROLLOUT_MAX_OUTPUT_BYTES', 16_384),

  deployPath: stringFromEnv('ROLLOUT_DEPLOY_PATH', '/opt/app'),
  containerName: stringFromEnv('ROLLOUT_CONTAINER_NAME', 'app'),
  hostPort: intFromEnv('ROLLOUT_HOST_PORT', 80),
  containerPort: intFromEnv('ROLLOUT_CONTAINER_PORT', 8080),
  healthPath: stringFromEnv('ROLLOUT_HEALTH_PATH', '/health'),
  healthAttempts: Math.max(1, intFromEnv('ROLLOUT_HEALTH_ATTEMPTS', 10)),
  healthIntervalSeconds: intFromEnv('ROLLOUT_HEALTH_INTERVAL_SECONDS', 3),
  credentialsRef: stringFromEnv('ROLLOUT_CREDENTIALS_REF', '/etc/rollout/docker'),
  executionPrincipal: stringFromEnv('ROLLOUT_EXECUTION_PRINCIPAL', 'rollout-orchestrator'),
  templateDir: stringFromEnv('ROLLOUT_TEMPLATE_DIR', join(__dirname, '..', '..', 'templates')),

  stageTimeoutsMs: {
    DependencyCheck: intFromEnv('ROLLOUT_TIMEOUT_DEPENDENCY_CHECK_MS', 300_000),
    ArtifactPull: intFromEnv('ROLLOUT_TIMEOUT_ARTIFACT_PULL_MS', 600_000),
    DeploySwap: intFromEnv('ROLLOUT_TIMEOUT_DEPLOY_SWAP_MS', 120_000),
    HealthCheck: intFromEnv('ROLLOUT_TIMEOUT_HEALTH_CHECK_MS', 90_000),
  },
}));

export type RolloutConfig = ConfigType<typeof rolloutConfig>;
