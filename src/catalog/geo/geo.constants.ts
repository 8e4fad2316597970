/**
 * GEO accession kinds (https://www.ncbi.nlm.nih.gov/geo/info/overview.html):
 * GPLxxx platform, GSMxxx sample, GSExxx series, GDSxxx curated dataset.
 */

export const E_UTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';
export const GEO_ACCN_BASE = 'https://www.ncbi.nlm.nih.gov/geo/query/acc.cgi';
export const GEO_FTP_BASE = 'https://ftp.ncbi.nlm.nih.gov/geo';

export const METHYLATION_PLATFORMS: Record<string, string> = {
  GPL13534: 'HumanMethylation450',
  GPL16304: 'HumanMethylation450 BeadChip',
  GPL21145: 'MethylationEPIC',
};

export const DEFAULT_PLATFORMS = ['GPL13534', 'GPL21145', 'GPL16304'];

// NCBI allows 3 requests/second without an API key, 10 with one
export const ENTREZ_INTERVAL_MS = 340;
export const ENTREZ_INTERVAL_WITH_KEY_MS = 110;

export const ESUMMARY_BATCH_SIZE = 100;
export const ESEARCH_PAGE_SIZE = 500;

export const ENTREZ_TOOL = 'idat-catalog';
