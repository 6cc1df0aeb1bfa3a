import { Test } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { rolloutConfig } from '../config/rollout.config';
import { testConfig } from '../../test/fakes/test-config';
import { PgFleetQueryService, toTarget } from './pg-fleet-query.service';

describe('toTarget', () => {
  it('maps a row and falls back to unknown liveness', () => {
    expect(toTarget({ id: 'i-0a', labels: { fleet: 'web' }, liveness: 'alive' })).toEqual({
      id: 'i-0a',
      liveness: 'alive',
      labels: { fleet: 'web' },
    });
    expect(toTarget({ id: 'i-0b', labels: null, liveness: 'asleep' })).toEqual({
      id: 'i-0b',
      liveness: 'unknown',
      labels: {},
    });
  });
});

describe('PgFleetQueryService', () => {
  it('filters by label containment with the heartbeat window as a parameter', async () => {
    const query = jest.fn().mockResolvedValue([{ id: 'i-0a', labels: { fleet: 'web' }, liveness: 'unreachable' }]);
    const moduleRef = await Test.createTestingModule({
      providers: [
        PgFleetQueryService,
        { provide: DataSource, useValue: { query } },
        { provide: rolloutConfig.KEY, useValue: testConfig({ heartbeatTimeoutSeconds: 45 }) },
      ],
    }).compile();
    const fleet = moduleRef.get(PgFleetQueryService);

    const targets = await fleet.list({ labels: { fleet: 'web' } });

    expect(targets).toEqual([{ id: 'i-0a', liveness: 'unreachable', labels: { fleet: 'web' } }]);
    expect(query).toHaveBeenCalledWith(expect.stringContaining('WHERE labels @> $1::jsonb'), [
      '{"fleet":"web"}',
      45,
    ]);
  });
});
