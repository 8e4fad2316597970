import * as cheerio from 'cheerio';
import { safeFilename } from '../normalize';

function decodeHref(href: string): string {
  try {
    return decodeURIComponent(href);
  } catch {
    return href;
  }
}

/**
 * Extracts the file links of an Apache-style index page, as served by
 * ftp.ncbi.nlm.nih.gov over HTTPS. Links live inside a `<pre>` block;
 * sorting links, the parent directory and anything that decodes to a path
 * rather than a bare file name are skipped.
 */
export function parseDirectoryListing(html: string): string[] {
  const $ = cheerio.load(html);
  const hrefs: string[] = [];

  $('pre a').each((_, element) => {
    const href = $(element).attr('href');
    if (!href || href.startsWith('?')) {
      return;
    }
    const name = decodeHref(href);
    if (safeFilename(name) === name) {
      hrefs.push(name);
    }
  });

  return hrefs;
}
