import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { HookRelayModule, hookRelayConfig } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      load: [hookRelayConfig],
    }),
    HookRelayModule.forRootAsync({
      inject: [hookRelayConfig.KEY],
      useFactory: (config: ConfigType<typeof hookRelayConfig>) => config,
    }),
  ],
})
export class AppModule {}
