import type { CatalogSample, CatalogStudy } from '../../catalog/catalog.types';
import { DryRunSink } from './dry-run.sink';

const study: CatalogStudy = {
  repository: 'geo',
  accession: 'GSE1',
  title: 'Blood methylation',
  summary: null,
  overallDesign: null,
  platformIds: [],
  organism: null,
  sampleCount: 0,
  releasedAt: null,
  extras: {},
  sampleAccessions: [],
};

const sample: CatalogSample = {
  repository: 'geo',
  accession: 'GSM1',
  seriesAccession: 'GSE1',
  platformId: null,
  title: null,
  organism: null,
  gender: null,
  age: null,
  tissue: null,
  disease: null,
  extractionProtocol: null,
  extras: {},
  files: [],
};

describe('DryRunSink', () => {
  it('hands out running ids per kind', async () => {
    const sink = new DryRunSink();

    await expect(sink.saveStudy(study)).resolves.toBe(1);
    await expect(sink.saveStudy(study)).resolves.toBe(2);
    await expect(sink.saveSample(sample, 2)).resolves.toBe(1);
  });

  it('never reports a file as transferred', async () => {
    const sink = new DryRunSink();
    const file = { filename: 'GSM1_Grn.idat', url: 'https://files.example.org/GSM1_Grn.idat', channel: null };

    expect(sink.canTransfer()).toBe(true);
    await expect(sink.saveFile(file, 1)).resolves.toBe(1);
    await expect(sink.transferFile(1, file, sample)).resolves.toBe(false);
  });
});
