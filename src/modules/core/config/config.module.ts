import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { INVOKER_CONFIG, loadInvokerConfig } from './invoker-config';

@Global()
@Module({
  imports: [NestConfigModule],
  providers: [
    {
      provide: INVOKER_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        loadInvokerConfig((key) => configService.get<string>(key)),
    },
  ],
  exports: [INVOKER_CONFIG],
})
export class ConfigModule {}
