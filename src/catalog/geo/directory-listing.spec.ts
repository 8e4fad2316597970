import { parseDirectoryListing } from './directory-listing';

const INDEX_HTML = `<html><head><title>Index of /geo/samples/GSM989nnn/GSM989827/suppl</title></head>
<body><h1>Index of /geo/samples/GSM989nnn/GSM989827/suppl</h1>
<pre>Name                    Last modified      Size  <a href="?C=N;O=D">Name</a>
<hr><a href="/geo/samples/GSM989nnn/GSM989827/">Parent Directory</a>
<a href="GSM989827_5815381016_R01C01_Grn.idat.gz">GSM989827_5815381016_R01C01_Grn.idat.gz</a> 2012-09-01 10:00  4.1M
<a href="GSM989827_5815381016_R01C01_Red.idat.gz">GSM989827_5815381016_R01C01_Red.idat.gz</a> 2012-09-01 10:00  4.0M
<a href="GSM989827%20notes.txt">GSM989827 notes.txt</a> 2012-09-01 10:00  1K
</pre></body></html>`;

describe('parseDirectoryListing', () => {
  it('returns decoded file names and skips navigation links', () => {
    expect(parseDirectoryListing(INDEX_HTML)).toEqual([
      'GSM989827_5815381016_R01C01_Grn.idat.gz',
      'GSM989827_5815381016_R01C01_Red.idat.gz',
      'GSM989827 notes.txt',
    ]);
  });

  it('drops links that decode to a path', () => {
    const html = `<pre>
<a href="%2E%2E%2F%2E%2E%2Ftmp%2Fescaped.idat">x</a>
<a href="..%2Fup_Grn.idat">x</a>
<a href="sub/">sub/</a>
<a href="GSM1_Grn.idat.gz">GSM1_Grn.idat.gz</a>
</pre>`;
    expect(parseDirectoryListing(html)).toEqual(['GSM1_Grn.idat.gz']);
  });

  it('keeps a name with a malformed escape as written', () => {
    expect(parseDirectoryListing('<pre><a href="GSM1_100%_Grn.idat">x</a></pre>')).toEqual([
      'GSM1_100%_Grn.idat',
    ]);
  });

  it('returns nothing for a page without a listing', () => {
    expect(parseDirectoryListing('<html><body>Not Found</body></html>')).toEqual([]);
  });
});
