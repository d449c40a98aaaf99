import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

/**
 * Loads the validated configuration once at startup. `cache: true` makes
 * every `ConfigService.get` read the same immutable snapshot.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [configuration],
      cache: true,
    }),
  ],
})
export class ConfigModule {}
