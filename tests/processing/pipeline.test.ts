// tests/processing/pipeline.test.ts
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createScrapePipeline, type PipelineConfig } from '../../src/processing/pipeline.js';
import { createRewriter, type Rewriter } from '../../src/processing/rewriter.js';
import { extractArticle } from '../../src/processing/extractor.js';
import { createSkipSet } from '../../src/processing/tag-filter.js';
import { FetchError, ReadError } from '../../src/errors.js';
import type { ArticleRecord, RewriteOutcome } from '../../src/types/index.js';

const pipelineConfig: PipelineConfig = {
  skipSet: createSkipSet(),
  defaultLanguage: 'english',
};

const articleHtml = `<html>
  <head>
    <title>T</title>
    <meta property="og:image" content="https://example.com/t.jpg">
    <meta property="article:published_time" content="2024-05-01">
    <meta name="author" content="Test Author">
  </head>
  <body><article><p>Hello</p><script>bad()</script></article></body>
</html>`;

const scraped: ArticleRecord = {
  title: 'T',
  content: '<article><p>Hello</p></article>',
  featuredImageUrl: 'https://example.com/t.jpg',
  publicationDate: '2024-05-01',
  author: 'Test Author',
  error: '',
};

const emptyFailure = {
  title: '',
  content: '',
  featuredImageUrl: '',
  publicationDate: null,
  author: null,
};

function stubRewriter(outcome?: RewriteOutcome) {
  return {
    rewrite: vi.fn<Rewriter['rewrite']>().mockImplementation((article) => {
      const result: RewriteOutcome = outcome ?? {
        success: true,
        article: { ...article, content: '# T\n\nHello' },
      };
      return Promise.resolve(result);
    }),
  };
}

describe('scrape pipeline', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should run every stage and return the rewritten article', async () => {
    const mockFetchHtml = vi.fn().mockResolvedValue(articleHtml);
    const rewriter = stubRewriter();
    const pipeline = createScrapePipeline(mockFetchHtml, extractArticle, rewriter, pipelineConfig);

    const article = await pipeline.scrape('https://example.com/article', { language: 'german' });

    expect(article).toEqual({ ...scraped, content: '# T\n\nHello' });
    expect(mockFetchHtml).toHaveBeenCalledWith('https://example.com/article', undefined);
    expect(rewriter.rewrite).toHaveBeenCalledWith(scraped, 'german', undefined, undefined);
  });

  it('should use the default language and forward model choice and signal', async () => {
    const rewriter = stubRewriter();
    const pipeline = createScrapePipeline(
      vi.fn().mockResolvedValue(articleHtml),
      extractArticle,
      rewriter,
      pipelineConfig
    );
    const controller = new AbortController();
    const modelChoice = { provider: 'anthropic' as const, model: 'claude-test' };

    await pipeline.scrape('https://example.com/article', { modelChoice, signal: controller.signal });

    expect(rewriter.rewrite).toHaveBeenCalledWith(scraped, 'english', modelChoice, controller.signal);
  });

  it('should stop after a fetch failure', async () => {
    const mockFetchHtml = vi
      .fn()
      .mockRejectedValue(new FetchError('fetch failed', ['connect ECONNREFUSED 127.0.0.1:443']));
    const mockExtract = vi.fn();
    const rewriter = stubRewriter();
    const pipeline = createScrapePipeline(mockFetchHtml, mockExtract, rewriter, pipelineConfig);

    const article = await pipeline.scrape('https://example.com/article');

    expect(article).toEqual({
      ...emptyFailure,
      error: 'Failed to fetch URL: fetch failed => connect ECONNREFUSED 127.0.0.1:443',
    });
    expect(article.error.startsWith('Failed to fetch URL:')).toBe(true);
    expect(mockExtract).not.toHaveBeenCalled();
    expect(rewriter.rewrite).not.toHaveBeenCalled();
  });

  it('should stop after a body read failure', async () => {
    const rewriter = stubRewriter();
    const pipeline = createScrapePipeline(
      vi.fn().mockRejectedValue(new ReadError('invalid utf-8')),
      extractArticle,
      rewriter,
      pipelineConfig
    );

    const article = await pipeline.scrape('https://example.com/article');

    expect(article).toEqual({ ...emptyFailure, error: 'Failed to read response body: invalid utf-8' });
    expect(rewriter.rewrite).not.toHaveBeenCalled();
  });

  it('should discard metadata when no content could be extracted', async () => {
    const html = articleHtml.replace(
      '<body><article><p>Hello</p><script>bad()</script></article></body>',
      '<body><nav>Menu</nav><footer>Footer</footer></body>'
    );
    const rewriter = stubRewriter();
    const pipeline = createScrapePipeline(
      vi.fn().mockResolvedValue(html),
      extractArticle,
      rewriter,
      pipelineConfig
    );

    const article = await pipeline.scrape('https://example.com/article');

    expect(article).toEqual({
      ...emptyFailure,
      error: 'Could not extract meaningful content from the page.',
    });
    expect(rewriter.rewrite).not.toHaveBeenCalled();
  });

  it('should keep the scraped record when the credential is missing', async () => {
    const rewriter = createRewriter(
      {},
      {
        defaultLanguage: 'english',
        defaultModel: { provider: 'openai', model: 'gpt-4o' },
        maxContextTokens: 128000,
        maxOutputTokens: 8000,
      }
    );
    const pipeline = createScrapePipeline(
      vi.fn().mockResolvedValue(articleHtml),
      extractArticle,
      rewriter,
      pipelineConfig
    );

    const article = await pipeline.scrape('https://example.com/article');

    expect(article).toEqual({
      ...scraped,
      error: 'Please set the OPENAI_API_KEY environment variable.',
    });
  });

  it('should keep the scraped record when the model call fails', async () => {
    const rewriter = stubRewriter({ success: false, error: 'LLM Error: OpenAI rate limit reached' });
    const pipeline = createScrapePipeline(
      vi.fn().mockResolvedValue(articleHtml),
      extractArticle,
      rewriter,
      pipelineConfig
    );

    const article = await pipeline.scrape('https://example.com/article');

    expect(article).toEqual({ ...scraped, error: 'LLM Error: OpenAI rate limit reached' });
  });

  it('should turn an unexpected exception into a failure record', async () => {
    const explodingExtract = vi.fn(() => {
      throw new Error('parser exploded');
    });
    const pipeline = createScrapePipeline(
      vi.fn().mockResolvedValue(articleHtml),
      explodingExtract,
      stubRewriter(),
      pipelineConfig
    );

    await expect(pipeline.scrape('https://example.com/article')).resolves.toEqual({
      ...emptyFailure,
      error: 'parser exploded',
    });
  });

  it('should never return content together with an error before the rewrite stage', async () => {
    const failures = [
      vi.fn().mockRejectedValue(new FetchError('fetch failed')),
      vi.fn().mockRejectedValue(new ReadError('terminated')),
      vi.fn().mockResolvedValue('<html><body><nav>Only nav</nav></body></html>'),
    ];

    for (const fetchHtml of failures) {
      const pipeline = createScrapePipeline(fetchHtml, extractArticle, stubRewriter(), pipelineConfig);
      const article = await pipeline.scrape('https://example.com/article');

      expect(article.error).not.toBe('');
      expect(article.content).toBe('');
    }
  });

  it('should run independent scrapes concurrently without sharing records', async () => {
    const pages: Record<string, string> = {
      'https://example.com/a': '<html><head><title>A</title></head><body><article><p>Alpha</p></article></body></html>',
      'https://example.com/b': '<html><head><title>B</title></head><body><p>Beta</p></body></html>',
    };
    const pipeline = createScrapePipeline(
      vi.fn((url: string) => Promise.resolve(pages[url])),
      extractArticle,
      stubRewriter(),
      pipelineConfig
    );

    const [a, b] = await Promise.all([
      pipeline.scrape('https://example.com/a'),
      pipeline.scrape('https://example.com/b'),
    ]);

    expect(a.title).toBe('A');
    expect(a.content).toBe('# T\n\nHello');
    expect(b.title).toBe('B');
    expect(b.error).toBe('');
  });
});
