import { testRagConfig } from '../../testing/fakes';
import { SourceType } from '../../utils/types';
import { extractReadableText, WebLoader } from './web.loader';

const page = `<!doctype html>
<html>
  <head><title> Pricing FAQ </title><style>.x { color: red }</style></head>
  <body>
    <nav><a href="/">Home</a></nav>
    <div>
      <h1>Refunds</h1>
      <p>Refunds are   accepted within 30 days.</p>
      <script>track()</script>
      <ul><li>Premium: 60 days</li><li>Terms &amp; conditions apply</li></ul>
    </div>
    <footer>Copyright Shop</footer>
  </body>
</html>`;

describe('extractReadableText', () => {
  it('keeps visible block text and drops page chrome', () => {
    expect(extractReadableText(page)).toEqual({
      title: 'Pricing FAQ',
      text: 'Refunds\nRefunds are accepted within 30 days.\nPremium: 60 days\nTerms & conditions apply',
    });
  });

  it('leaves the title undefined when the page has none', () => {
    expect(extractReadableText('<p>Hello</p>')).toEqual({ title: undefined, text: 'Hello' });
  });
});

describe('WebLoader', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  const loader = new WebLoader(testRagConfig());

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('loads the page as a single section located at its url', async () => {
    fetchSpy.mockResolvedValueOnce(new Response(page, { status: 200, headers: { 'Content-Type': 'text/html; charset=utf-8' } }));

    const loaded = await loader.load({ sourceType: SourceType.WEB, displayName: 'FAQ', url: 'https://example.test/faq' });

    expect(loaded.title).toBe('Pricing FAQ');
    expect(loaded.sections).toEqual([{
      text: 'Refunds\nRefunds are accepted within 30 days.\nPremium: 60 days\nTerms & conditions apply',
      location: 'https://example.test/faq',
    }]);
  });

  it('fails on a non-success status', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('gone', { status: 410 }));

    await expect(loader.load({ sourceType: SourceType.WEB, displayName: 'FAQ', url: 'https://example.test/old' }))
      .rejects.toThrow('Fetching https://example.test/old failed with status 410');
  });
});
