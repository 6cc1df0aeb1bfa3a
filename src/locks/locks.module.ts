import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { PgTargetLockService, TARGET_LOCK_POOL } from './pg-target-lock.service';
import { TargetLock } from './target-lock';

@Module({
  providers: [
    {
      provide: TARGET_LOCK_POOL,
      useFactory: (config: ConfigService) =>
        new Pool({ connectionString: config.getOrThrow<string>('DATABASE_URL') }),
      inject: [ConfigService],
    },
    { provide: TargetLock, useClass: PgTargetLockService },
  ],
  exports: [TargetLock],
})
export class LocksModule {}
