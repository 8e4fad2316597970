import { Logger } from '@nestjs/common';
import type {
  CatalogFile,
  CatalogSample,
  CatalogStudy,
} from '../../catalog/catalog.types';
import type { CatalogSink } from '../ingestion.types';

/** Logs what would be written. Ids are a running counter per kind. */
export class DryRunSink implements CatalogSink {
  private readonly logger = new Logger(DryRunSink.name);
  private readonly counters = { study: 0, sample: 0, file: 0 };

  async saveStudy(study: CatalogStudy): Promise<number> {
    this.logger.log(
      `[dry-run] study ${study.repository}:${study.accession} "${study.title}" platforms=${study.platformIds.join(',') || '-'} samples=${study.sampleAccessions.length}`,
    );
    return ++this.counters.study;
  }

  async saveSample(sample: CatalogSample, studyId: number): Promise<number> {
    this.logger.log(
      `[dry-run] sample ${sample.accession} (study #${studyId}) gender=${sample.gender ?? '-'} age=${sample.age ?? '-'} tissue=${sample.tissue ?? '-'} disease=${sample.disease ?? '-'}`,
    );
    return ++this.counters.sample;
  }

  async saveFile(file: CatalogFile, sampleId: number): Promise<number> {
    this.logger.log(`[dry-run] file ${file.url} (sample #${sampleId})`);
    return ++this.counters.file;
  }

  canTransfer(): boolean {
    return true;
  }

  async transferFile(
    _fileId: number,
    file: CatalogFile,
    sample: CatalogSample,
  ): Promise<boolean> {
    this.logger.log(`[dry-run] would upload ${file.filename} of ${sample.accession}`);
    return false;
  }
}
