import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { HealthModule } from './health/health.module';
import { GatewayModule } from './gateway/gateway.module';

/**
 * Application Module
 * HTTP image gateway: health endpoints and the signed image route
 *
 * HealthModule is imported first so `/health` is registered before the
 * catch-all image route.
 */
@Module({
  imports: [ConfigModule, SharedModule, HealthModule, GatewayModule],
})
export class AppModule {}
