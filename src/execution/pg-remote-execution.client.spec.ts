import { Test } from '@nestjs/testing';
import { rolloutConfig } from '../config/rollout.config';
import {
  RemoteCommandQueueService,
  RemoteCommandRecord,
} from '../queue/remote-command-queue.service';
import { TargetRegistryService } from '../targets/target-registry.service';
import { target } from '../../test/fakes/in-memory-fleet';
import { testConfig } from '../../test/fakes/test-config';
import { DispatchError } from './dispatch.error';
import { PgRemoteExecutionClient } from './pg-remote-execution.client';

function record(overrides: Partial<RemoteCommandRecord> = {}): RemoteCommandRecord {
  return {
    id: 'cmd-1',
    target_id: 'i-0a',
    template: 'artifact-pull',
    body: 'docker pull reg/app:1',
    status: 'pending',
    timeout_ms: 1000,
    exit_code: null,
    output: '',
    output_truncated: false,
    ...overrides,
  };
}

describe('PgRemoteExecutionClient', () => {
  const node = target('i-0a', { fleet: 'web' });
  const command = { template: 'artifact-pull', body: 'docker pull reg/app:1' };
  let queue: { enqueue: jest.Mock; findOne: jest.Mock };
  let registry: { findOne: jest.Mock };
  let client: PgRemoteExecutionClient;

  beforeEach(async () => {
    queue = { enqueue: jest.fn().mockResolvedValue('cmd-1'), findOne: jest.fn() };
    registry = { findOne: jest.fn().mockResolvedValue(node) };

    const moduleRef = await Test.createTestingModule({
      providers: [
        PgRemoteExecutionClient,
        { provide: RemoteCommandQueueService, useValue: queue },
        { provide: TargetRegistryService, useValue: registry },
        { provide: rolloutConfig.KEY, useValue: testConfig({ pollIntervalMs: 5, maxOutputBytes: 16 }) },
      ],
    }).compile();
    client = moduleRef.get(PgRemoteExecutionClient);
  });

  describe('dispatch', () => {
    it('enqueues the command for a live target and returns its handle', async () => {
      const handle = await client.dispatch(node, command, {
        identity: { principal: 'test-principal', acquiredAt: new Date(0) },
        deadlineMs: 600,
      });

      expect(handle).toEqual({ id: 'cmd-1', targetId: 'i-0a' });
      expect(queue.enqueue).toHaveBeenCalledWith({
        targetId: 'i-0a',
        template: 'artifact-pull',
        body: 'docker pull reg/app:1',
        requestedBy: 'test-principal',
        timeoutMs: 600,
      });
    });

    it('re-checks liveness and refuses a target that went quiet', async () => {
      registry.findOne.mockResolvedValue(target('i-0a', { fleet: 'web' }, 'unreachable'));
      await expect(client.dispatch(node, command)).rejects.toThrow(DispatchError);
      expect(queue.enqueue).not.toHaveBeenCalled();
    });

    it('refuses a target that no longer exists', async () => {
      registry.findOne.mockResolvedValue(null);
      await expect(client.dispatch(node, command)).rejects.toThrow('Target i-0a cannot accept commands');
    });
  });

  describe('poll', () => {
    const handle = { id: 'cmd-1', targetId: 'i-0a' };

    it('waits for a terminal status', async () => {
      queue.findOne
        .mockResolvedValueOnce(record({ status: 'pending' }))
        .mockResolvedValueOnce(record({ status: 'running' }))
        .mockResolvedValue(record({ status: 'success', exit_code: 0, output: 'ok\n' }));

      const outcome = await client.poll(handle, 1000);
      expect(outcome).toEqual({ status: 'Success', output: 'ok\n', truncated: false, exitCode: 0 });
      expect(queue.findOne).toHaveBeenCalledTimes(3);
    });

    it('returns the same outcome every time a finished command is polled', async () => {
      queue.findOne.mockResolvedValue(record({ status: 'failed', exit_code: 2, output: 'no space\n' }));
      const first = await client.poll(handle, 1000);
      const second = await client.poll(handle, 1000);
      expect(first).toEqual({ status: 'Failure', output: 'no space\n', truncated: false, exitCode: 2 });
      expect(second).toEqual(first);
    });

    it('returns TimedOut with the output so far when the wait runs out', async () => {
      queue.findOne.mockResolvedValue(record({ status: 'running', output: 'pulling\n' }));
      const outcome = await client.poll(handle, 20);
      expect(outcome).toEqual({ status: 'TimedOut', output: 'pulling\n', truncated: false, exitCode: null });
    });

    it('maps agent-side deadline and silent-target statuses', async () => {
      queue.findOne.mockResolvedValueOnce(record({ status: 'timed_out' }));
      expect((await client.poll(handle, 1000)).status).toBe('TimedOut');

      queue.findOne.mockResolvedValueOnce(record({ status: 'target_unreachable' }));
      expect((await client.poll(handle, 1000)).status).toBe('TargetUnreachable');
    });

    it('keeps the tail of long output', async () => {
      queue.findOne.mockResolvedValue(
        record({ status: 'success', exit_code: 0, output: `${'x'.repeat(10)}TAIL-MARKER` }),
      );
      const outcome = await client.poll(handle, 1000);
      expect(outcome.output).toBe('xxxxxTAIL-MARKER');
      expect(outcome.truncated).toBe(true);
    });

    it('keeps polling through a failed read', async () => {
      queue.findOne
        .mockRejectedValueOnce(new Error('read ECONNRESET'))
        .mockResolvedValue(record({ status: 'success', exit_code: 0, output: 'ok\n' }));

      const outcome = await client.poll(handle, 1000);

      expect(outcome.status).toBe('Success');
      expect(queue.findOne).toHaveBeenCalledTimes(2);
    });

    it('times out with the read error when the row never becomes readable', async () => {
      queue.findOne.mockRejectedValue(new Error('read ECONNRESET'));

      const outcome = await client.poll(handle, 20);

      expect(outcome).toEqual({
        status: 'TimedOut',
        output: 'Command cmd-1 unreadable: read ECONNRESET',
        truncated: false,
        exitCode: null,
      });
    });

    it('reports the last row it read when later reads fail', async () => {
      queue.findOne
        .mockResolvedValueOnce(record({ status: 'running', output: 'pulling\n' }))
        .mockRejectedValue(new Error('read ECONNRESET'));

      const outcome = await client.poll(handle, 20);

      expect(outcome).toEqual({ status: 'TimedOut', output: 'pulling\n', truncated: false, exitCode: null });
    });

    it('rejects a handle it never issued', async () => {
      queue.findOne.mockResolvedValue(null);
      await expect(client.poll({ id: 'cmd-9', targetId: 'i-0a' }, 10)).rejects.toThrow(
        'Unknown command handle cmd-9',
      );
    });
  });
});
