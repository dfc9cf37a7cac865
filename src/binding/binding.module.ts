import { Module } from '@nestjs/common';
import { ResolverModule } from '../resolver/resolver.module';
import { SwitchboardModule } from '../switchboard/switchboard.module';
import { TenantBindingInterceptor } from './tenant-binding.interceptor';
import { TenantBindingService } from './tenant-binding.service';

@Module({
  imports: [ResolverModule, SwitchboardModule],
  providers: [TenantBindingService, TenantBindingInterceptor],
  exports: [TenantBindingService, TenantBindingInterceptor, ResolverModule, SwitchboardModule],
})
export class BindingModule {}
