import { Module } from '@nestjs/common';
import { FleetQuery } from './fleet-query';
import { PgFleetQueryService } from './pg-fleet-query.service';
import { TargetRegistryService } from './target-registry.service';
import { TargetResolverService } from './target-resolver.service';

@Module({
  providers: [
    { provide: FleetQuery, useClass: PgFleetQueryService },
    TargetResolverService,
    TargetRegistryService,
  ],
  exports: [FleetQuery, TargetResolverService, TargetRegistryService],
})
export class TargetsModule {}
