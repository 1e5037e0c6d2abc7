// @author lockerdb contributors
// @date 2026-10-19
import { describe, it, expect } from 'vitest';
import { escapeHtml, renderCollectionPage, renderIndexPage } from './pages.mjs';

describe('escapeHtml', () => {
  it('escapes markup and quotes', () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;',
    );
  });
});

describe('renderIndexPage', () => {
  it('links every collection of the schema', () => {
    const html = renderIndexPage({ schemaName: 'public', collections: ['orders', 'users'] });

    expect(html).toContain('<h2>Collections in public</h2>');
    expect(html).toContain('<li><a href="/collections/public/orders">orders</a></li>');
    expect(html).toContain('<li><a href="/collections/public/users">users</a></li>');
  });

  it('shows messages and errors as text', () => {
    const html = renderIndexPage({
      schemaName: 'public',
      collections: [],
      message: 'Collection users created',
      error: '<script>',
    });

    expect(html).toContain('<p class="message">Collection users created</p>');
    expect(html).toContain('<p class="error">Error: &lt;script&gt;</p>');
    expect(html).toContain('<p>No collections yet.</p>');
  });
});

describe('renderCollectionPage', () => {
  it('renders records with edit and delete forms', () => {
    const html = renderCollectionPage({
      schemaName: 'public',
      collectionName: 'users',
      records: [{ _id: 'abc', name: '<b>bob</b>', _version: 0 }],
    });

    expect(html).toContain('&quot;name&quot;: &quot;&lt;b&gt;bob&lt;/b&gt;&quot;');
    expect(html).toContain('<input type="hidden" name="id" value="abc" />');
    expect(html).toContain('<textarea name="data">{&quot;name&quot;:&quot;&lt;b&gt;bob&lt;/b&gt;&quot;}</textarea>');
    expect(html).not.toContain('<b>bob</b>');
  });

  it('says so when the collection is empty', () => {
    const html = renderCollectionPage({ schemaName: 'public', collectionName: 'users', records: [] });

    expect(html).toContain('<p>No records.</p>');
    expect(html).toContain('<form method="post" action="/web/drop">');
  });
});
