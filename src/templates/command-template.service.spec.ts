import { Test } from '@nestjs/testing';
import { rolloutConfig } from '../config/rollout.config';
import { buildStages } from '../pipeline/stages';
import { testConfig } from '../../test/fakes/test-config';
import { parseTemplate } from './command-template';
import { CommandTemplateService } from './command-template.service';
import { RenderError } from './render.error';

describe('CommandTemplateService', () => {
  const config = testConfig();
  let service: CommandTemplateService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [CommandTemplateService, { provide: rolloutConfig.KEY, useValue: config }],
    }).compile();
    await moduleRef.init();
    service = moduleRef.get(CommandTemplateService);
  });

  it('loads every stage template from the template directory on init', () => {
    expect(service.names()).toEqual(['artifact-pull', 'dependency-check', 'deploy-swap', 'health-check']);
  });

  it('declares the placeholders each stage script needs', () => {
    expect(service.get('dependency-check').placeholders).toEqual(['target_id', 'deploy_path']);
    expect(service.get('artifact-pull').placeholders).toEqual([
      'credentials_ref',
      'image_ref',
      'deploy_path',
    ]);
    expect(service.get('deploy-swap').placeholders).toEqual([
      'credentials_ref',
      'container_name',
      'host_port',
      'container_port',
      'image_ref',
      'deploy_path',
    ]);
    expect(service.get('health-check').placeholders).toEqual([
      'attempt_count',
      'health_url',
      'attempt_interval',
    ]);
  });

  it('keeps container runtime format strings intact', () => {
    const rendered = service.render('artifact-pull', {
      image_ref: 'reg/app:1',
      credentials_ref: '/etc/rollout/docker',
      deploy_path: '/opt/app',
    });
    expect(rendered.body).toContain("docker image inspect --format '{{.Id}}' reg/app:1\n");
    expect(rendered.body).toContain('export DOCKER_CONFIG=/etc/rollout/docker\n');
  });

  it('renders every default stage with the bindings it computes', () => {
    const context = {
      runId: 'run-1',
      imageRef: 'reg/app:1',
      identity: { principal: 'test-principal', acquiredAt: new Date(0) },
    };
    const target = { id: 'i-0a', liveness: 'alive' as const, labels: { fleet: 'web' } };

    for (const stage of buildStages(config)) {
      expect(() => service.render(stage.template, stage.bindings(target, context))).not.toThrow();
    }
    const health = buildStages(config)[3];
    expect(service.render(health.template, health.bindings(target, context)).body).toContain(
      'curl -fsS -o /dev/null --max-time 5 http://127.0.0.1:80/health;',
    );
  });

  it('throws UnknownTemplate for names it never loaded', () => {
    expect(() => service.get('rollback')).toThrow(RenderError);
    expect(() => service.render('rollback', {})).toThrow('Unknown command template "rollback"');
  });

  it('validates bindings with the same errors render would raise', () => {
    const bindings = { image_ref: 'reg/app:1', credentials_ref: '/etc/rollout/docker' };
    expect(() => service.validate('artifact-pull', bindings)).toThrow(
      'Template "artifact-pull" requires binding "deploy_path"',
    );
    expect(() => service.validate('artifact-pull', { ...bindings, deploy_path: '/opt/app' })).not.toThrow();
    expect(() => service.validate('rollback', {})).toThrow('Unknown command template "rollback"');
  });

  it('lets a registered template replace a loaded one', () => {
    service.register(parseTemplate('health-check', 'true'));
    expect(service.render('health-check', {}).body).toBe('true');
  });
});
