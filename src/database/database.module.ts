import { DynamicModule, Global, Module } from '@nestjs/common';
import {
  DATABASE_OPTIONS,
  DatabaseOptions,
  DatabaseService,
} from '../db/database.service';
import {
  IdatFileRepository,
  SampleRepository,
  StudyRepository,
} from './repositories';

const repositories = [StudyRepository, SampleRepository, IdatFileRepository];

@Global()
@Module({})
export class DatabaseModule {
  static forRoot(
    options: DatabaseOptions = { probeOnInit: true },
  ): DynamicModule {
    return {
      module: DatabaseModule,
      global: true,
      providers: [
        { provide: DATABASE_OPTIONS, useValue: options },
        DatabaseService,
        ...repositories,
      ],
      exports: [DatabaseService, ...repositories],
    };
  }
}
