import { RolloutConfig } from '../config/rollout.config';
import { StageDefinition } from './stage';

export const PIPELINE_STAGES = Symbol('PIPELINE_STAGES');

/**
 * The four deployment stages in their fixed order.
 */
export function buildStages(config: RolloutConfig): readonly StageDefinition[] {
  const stages: StageDefinition[] = [
    {
      name: 'DependencyCheck',
      template: 'dependency-check',
      timeoutMs: config.stageTimeoutsMs.DependencyCheck,
      expectMarker: 'ROLLOUT_DEPENDENCIES_OK',
      bindings: (target) => ({
        target_id: target.id,
        deploy_path: config.deployPath,
      }),
    },
    {
      name: 'ArtifactPull',
      template: 'artifact-pull',
      timeoutMs: config.stageTimeoutsMs.ArtifactPull,
      expectMarker: 'ROLLOUT_ARTIFACT_OK',
      bindings: (_target, context) => ({
        image_ref: context.imageRef,
        credentials_ref: config.credentialsRef,
        deploy_path: config.deployPath,
      }),
    },
    {
      name: 'DeploySwap',
      template: 'deploy-swap',
      timeoutMs: config.stageTimeoutsMs.DeploySwap,
      expectMarker: 'ROLLOUT_SWAP_OK',
      bindings: (_target, context) => ({
        image_ref: context.imageRef,
        credentials_ref: config.credentialsRef,
        deploy_path: config.deployPath,
        container_name: config.containerName,
        host_port: config.hostPort,
        container_port: config.containerPort,
      }),
    },
    {
      name: 'HealthCheck',
      template: 'health-check',
      timeoutMs: config.stageTimeoutsMs.HealthCheck,
      expectMarker: 'ROLLOUT_HEALTHY',
      bindings: () => ({
        health_url: `http://127.0.0.1:${config.hostPort}${config.healthPath}`,
        attempt_count: config.healthAttempts,
        attempt_interval: config.healthIntervalSeconds,
      }),
    },
  ];
  return Object.freeze(stages);
}
