import { Module } from '@nestjs/common';
import { Clock } from '../common/clock';
import { StoreConfig, storeConfig } from '../config/store.config';
import { DatabaseService } from '../database/database.service';
import { IdentityStore } from './identity.store';
import { InMemoryIdentityStore } from './memory-identity.store';
import { PgIdentityStore } from './pg-identity.store';

@Module({
  providers: [
    {
      provide: IdentityStore,
      inject: [storeConfig.KEY, DatabaseService, Clock],
      useFactory: (config: StoreConfig, db: DatabaseService, clock: Clock): IdentityStore =>
        config.driver === 'postgres' ? new PgIdentityStore(db) : new InMemoryIdentityStore(clock),
    },
  ],
  exports: [IdentityStore],
})
export class IdentityModule {}
