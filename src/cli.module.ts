import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { configuration } from './config/configuration';
import { validate } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { IngestionModule } from './ingestion/ingestion.module';

export interface CliModuleOptions {
  /** Dry runs never touch the database, so they skip the connection probe. */
  dryRun?: boolean;
}

@Module({})
export class CliModule {
  static forRoot(options: CliModuleOptions = {}): DynamicModule {
    return {
      module: CliModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: '.env',
          validate,
          load: [() => configuration()],
        }),
        DatabaseModule.forRoot({ probeOnInit: !options.dryRun }),
        IngestionModule,
      ],
    };
  }
}
