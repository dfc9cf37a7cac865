import { Module } from '@nestjs/common';
import { SwitchboardModule } from '../switchboard/switchboard.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [SwitchboardModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
