import { Injectable, Logger } from '@nestjs/common';
import { ArrayExpressClient } from '../catalog/arrayexpress/arrayexpress.client';
import type { CatalogSample, CatalogStudy } from '../catalog/catalog.types';
import { GeoClient, GeoSeriesRecord } from '../catalog/geo/geo.client';
import { errorMessage } from '../common/errors';
import {
  CatalogSink,
  CrawlOptions,
  CrawlReport,
  emptyReport,
} from './ingestion.types';
import { DatabaseSink } from './sinks/database.sink';
import { DryRunSink } from './sinks/dry-run.sink';

type SampleLoader = (accession: string) => Promise<CatalogSample>;

/**
 * Crawls the remote catalogs and loads studies, samples and raw file
 * references into the store, one study at a time. A search that breaks off
 * is recorded under the accession `search` and ends that repository's crawl
 * with what was loaded so far.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(
    private readonly geo: GeoClient,
    private readonly arrayExpress: ArrayExpressClient,
    private readonly databaseSink: DatabaseSink,
  ) {}

  async crawlGeo(options: CrawlOptions = {}): Promise<CrawlReport> {
    const sink = this.sinkFor(options);
    const report = emptyReport('geo');

    try {
      for await (const summary of this.geo.iterateSeries({
        platforms: options.platforms,
        limit: options.limit,
      })) {
        let series: GeoSeriesRecord | undefined;
        try {
          series = await this.geo.getSeries(summary.accession);
        } catch (error) {
          // The esummary record alone is enough to load the study
          this.logger.warn(
            `SOFT lookup of ${summary.accession} failed: ${errorMessage(error)}`,
          );
        }

        await this.ingestStudy(
          sink,
          this.geo.toCatalogStudy(summary, series),
          (accession) => this.geo.getSample(accession),
          options,
          report,
        );
      }
    } catch (error) {
      this.fail(report, 'search', error);
    }

    return this.finish(report);
  }

  async crawlArrayExpress(options: CrawlOptions = {}): Promise<CrawlReport> {
    const sink = this.sinkFor(options);
    const report = emptyReport('arrayexpress');

    try {
      for await (const hit of this.arrayExpress.iterateStudies({
        limit: options.limit,
      })) {
        let study: CatalogStudy;
        let samples: Map<string, CatalogSample>;
        try {
          const record = await this.arrayExpress.getStudy(hit.accession);
          const sampleList = await this.arrayExpress.getStudySamples(hit.accession);
          study = this.arrayExpress.toCatalogStudy(hit, record, sampleList);
          samples = new Map(sampleList.map((s) => [s.accession, s]));
        } catch (error) {
          this.fail(report, hit.accession, error);
          continue;
        }

        await this.ingestStudy(
          sink,
          study,
          async (accession) => {
            const sample = samples.get(accession);
            if (!sample) throw new Error(`Sample ${accession} missing from SDRF`);
            return sample;
          },
          options,
          report,
        );
      }
    } catch (error) {
      this.fail(report, 'search', error);
    }

    return this.finish(report);
  }

  async crawlAll(options: CrawlOptions = {}): Promise<CrawlReport[]> {
    return [
      await this.crawlGeo(options),
      await this.crawlArrayExpress(options),
    ];
  }

  private async ingestStudy(
    sink: CatalogSink,
    study: CatalogStudy,
    loadSample: SampleLoader,
    options: CrawlOptions,
    report: CrawlReport,
  ): Promise<void> {
    let studyId: number;
    try {
      studyId = await sink.saveStudy(study);
    } catch (error) {
      this.fail(report, study.accession, error);
      return;
    }
    report.studies++;

    const accessions =
      options.sampleLimit !== undefined
        ? study.sampleAccessions.slice(0, options.sampleLimit)
        : study.sampleAccessions;
    this.logger.log(
      `Study ${study.accession}: loading ${accessions.length} of ${study.sampleAccessions.length} samples`,
    );

    for (const accession of accessions) {
      try {
        const sample = await loadSample(accession);
        await this.ingestSample(sink, sample, studyId, options, report);
      } catch (error) {
        this.fail(report, accession, error);
      }
    }
  }

  private async ingestSample(
    sink: CatalogSink,
    sample: CatalogSample,
    studyId: number,
    options: CrawlOptions,
    report: CrawlReport,
  ): Promise<void> {
    const sampleId = await sink.saveSample(sample, studyId);
    report.samples++;

    if (sample.files.length === 0) {
      this.logger.warn(`Sample ${sample.accession} lists no IDAT files`);
    }

    for (const file of sample.files) {
      const fileId = await sink.saveFile(file, sampleId);
      report.files++;

      if (!options.uploadFiles) continue;
      try {
        if (await sink.transferFile(fileId, file, sample)) {
          report.uploaded++;
        }
      } catch (error) {
        this.fail(report, `${sample.accession}/${file.filename}`, error);
      }
    }
  }

  private sinkFor(options: CrawlOptions): CatalogSink {
    const sink = options.dryRun ? new DryRunSink() : this.databaseSink;
    if (options.uploadFiles && !sink.canTransfer()) {
      throw new Error(
        'File upload requested but object storage is not configured',
      );
    }
    return sink;
  }

  private fail(report: CrawlReport, accession: string, error: unknown) {
    const reason = errorMessage(error);
    this.logger.error(`${report.repository} ${accession}: ${reason}`);
    report.failures.push({ accession, reason });
  }

  private finish(report: CrawlReport): CrawlReport {
    this.logger.log(
      `${report.repository} crawl done: ${report.studies} studies, ${report.samples} samples, ${report.files} files, ${report.uploaded} uploaded, ${report.failures.length} failures`,
    );
    return report;
  }
}
