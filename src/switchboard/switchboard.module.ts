import { Module } from '@nestjs/common';
import { PgStoreBackend } from './pg-store-backend';
import { STORE_BACKEND } from './store-backend.interface';
import { StoreSwitchboardService } from './store-switchboard.service';

@Module({
  providers: [{ provide: STORE_BACKEND, useClass: PgStoreBackend }, StoreSwitchboardService],
  exports: [StoreSwitchboardService, STORE_BACKEND],
})
export class SwitchboardModule {}
