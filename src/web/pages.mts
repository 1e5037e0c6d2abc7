// @author lockerdb contributors
// @date 2026-10-19
import { stripReserved, type JsonObject } from '../record-codec.mjs';

export interface PageNotice {
  message?: string;
  error?: string;
}

export interface IndexPageData extends PageNotice {
  schemaName: string;
  collections: string[];
}

export interface CollectionPageData extends PageNotice {
  schemaName: string;
  collectionName: string;
  records: JsonObject[];
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escapes HTML special characters so stored values render as text.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function collectionHref(schemaName: string, collectionName: string): string {
  return `/collections/${encodeURIComponent(schemaName)}/${encodeURIComponent(collectionName)}`;
}

function layout(title: string, notice: PageNotice, body: string): string {
  const message = notice.message ? `<p class="message">${escapeHtml(notice.message)}</p>` : '';
  const error = notice.error ? `<p class="error">Error: ${escapeHtml(notice.error)}</p>` : '';
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${escapeHtml(title)} · lockerdb</title>
    <style>
      body { font-family: system-ui, sans-serif; background: #0f172a; color: #e2e8f0; margin: 0 auto; max-width: 960px; padding: 24px; }
      a { color: #38bdf8; }
      pre { background: #1e293b; border-radius: 6px; padding: 12px; overflow-x: auto; }
      textarea { width: 100%; min-height: 64px; font-family: monospace; }
      .message { color: #4ade80; }
      .error { color: #f87171; }
      .record { border: 1px solid rgba(255, 255, 255, 0.1); border-radius: 6px; margin-bottom: 16px; padding: 12px; }
    </style>
  </head>
  <body>
    <h1><a href="/">lockerdb</a></h1>
    ${message}${error}
${body}
  </body>
</html>
`;
}

export function renderIndexPage(page: IndexPageData): string {
  const items = page.collections
    .map((name) => `<li><a href="${escapeHtml(collectionHref(page.schemaName, name))}">${escapeHtml(name)}</a></li>`)
    .join('\n      ');
  const list = page.collections.length > 0 ? `<ul>\n      ${items}\n    </ul>` : '<p>No collections yet.</p>';

  return layout(
    `Schema ${page.schemaName}`,
    page,
    `    <h2>Collections in ${escapeHtml(page.schemaName)}</h2>
    ${list}
    <h2>Create collection</h2>
    <form method="post" action="/web/create">
      <input name="collection_name" placeholder="collection name" required />
      <textarea name="data" placeholder='optional first record, e.g. {"name":"bob"}'></textarea>
      <button type="submit">Create</button>
    </form>`,
  );
}

function hiddenTarget(page: CollectionPageData): string {
  return `<input type="hidden" name="schema_name" value="${escapeHtml(page.schemaName)}" />
        <input type="hidden" name="collection_name" value="${escapeHtml(page.collectionName)}" />`;
}

function renderRecord(page: CollectionPageData, record: JsonObject): string {
  const id = typeof record['_id'] === 'string' ? record['_id'] : '';
  return `    <div class="record">
      <pre>${escapeHtml(JSON.stringify(record, null, 2))}</pre>
      <form method="post" action="/web/edit">
        ${hiddenTarget(page)}
        <input type="hidden" name="id" value="${escapeHtml(id)}" />
        <textarea name="data">${escapeHtml(JSON.stringify(stripReserved(record)))}</textarea>
        <button type="submit">Save</button>
      </form>
      <form method="post" action="/web/delete">
        ${hiddenTarget(page)}
        <input type="hidden" name="id" value="${escapeHtml(id)}" />
        <button type="submit">Delete</button>
      </form>
    </div>`;
}

export function renderCollectionPage(page: CollectionPageData): string {
  const records =
    page.records.length > 0
      ? page.records.map((record) => renderRecord(page, record)).join('\n')
      : '    <p>No records.</p>';

  return layout(
    `${page.schemaName}/${page.collectionName}`,
    page,
    `    <h2>${escapeHtml(page.schemaName)} / ${escapeHtml(page.collectionName)}</h2>
${records}
    <h2>Insert record</h2>
    <form method="post" action="/web/insert">
      ${hiddenTarget(page)}
      <textarea name="data" placeholder='{"name":"bob"}' required></textarea>
      <button type="submit">Insert</button>
    </form>
    <form method="post" action="/web/drop">
      ${hiddenTarget(page)}
      <button type="submit">Drop collection</button>
    </form>`,
  );
}
