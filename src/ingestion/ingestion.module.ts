import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { StorageModule } from '../storage/storage.module';
import { IngestionService } from './ingestion.service';
import { DatabaseSink } from './sinks/database.sink';

@Module({
  imports: [CatalogModule, StorageModule],
  providers: [DatabaseSink, IngestionService],
  exports: [IngestionService],
})
export class IngestionModule {}
