import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { kassaEnvConfig, validateEnv } from './config';
import { KassaModule } from './modules';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
      load: [kassaEnvConfig],
    }),
    KassaModule.forRootAsync({
      inject: [kassaEnvConfig.KEY],
      useFactory: (config: ConfigType<typeof kassaEnvConfig>) => config,
    }),
  ],
})
export class AppModule {}
