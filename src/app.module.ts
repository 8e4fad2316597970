import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { configuration } from './config/configuration';
import { validate } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { HealthController } from './health.controller';
import { SamplesModule } from './samples/samples.module';
import { StudiesModule } from './studies/studies.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
      load: [() => configuration()],
    }),
    DatabaseModule.forRoot(),
    StudiesModule,
    SamplesModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
