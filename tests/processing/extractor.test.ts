// tests/processing/extractor.test.ts
import { describe, it, expect } from 'vitest';
import { extractArticle } from '../../src/processing/extractor.js';
import { createSkipSet } from '../../src/processing/tag-filter.js';

const head = `
  <head>
    <title>Test Article</title>
    <meta property="og:image" content="https://example.com/image.png">
    <meta name="author" content="Test Author">
  </head>
`;

describe('extractor', () => {
  const skipSet = createSkipSet();

  it('should extract cleaned content and metadata from HTML', () => {
    const html = `
      <html>
        ${head}
        <body>
          <nav>Navigation</nav>
          <article>
            <h1>Test Article</h1>
            <p>This is the main content of the article.</p>
            <p>Another paragraph with more content.</p>
          </article>
          <footer>Footer content</footer>
        </body>
      </html>
    `;

    const result = extractArticle(html, skipSet, 'https://example.com/news/1');

    expect(result.content).toBe(
      '<article><h1>Test Article</h1> <p>This is the main content of the article.</p> <p>Another paragraph with more content.</p></article>'
    );
    expect(result.metadata).toEqual({
      title: 'Test Article',
      featuredImageUrl: 'https://example.com/image.png',
      publicationDate: null,
      author: 'Test Author',
    });
  });

  it('should not run page scripts', () => {
    const html = `<html><body><article><p id="x">Static</p></article>
      <script>document.getElementById('x').textContent = 'Changed';</script></body></html>`;

    expect(extractArticle(html, skipSet).content).toBe('<article><p>Static</p></article>');
  });

  it('should return the same metadata whether or not content was found', () => {
    const withContent = extractArticle(
      `<html>${head}<body><article><p>Story</p></article></body></html>`,
      skipSet
    );
    const withoutContent = extractArticle(
      `<html>${head}<body><nav>Menu</nav><script>x()</script></body></html>`,
      skipSet
    );

    expect(withContent.content).toBe('<article><p>Story</p></article>');
    expect(withoutContent.content).toBe('');
    expect(withoutContent.metadata).toEqual(withContent.metadata);
  });
});
