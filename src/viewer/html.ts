import { DatabaseStats } from '../store/catalogStore';
import { QueryResult, RowFilter, StoredValue, TableInfo } from '../types';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatCell(value: StoredValue): string {
  if (value === null) return '';
  if (Buffer.isBuffer(value)) return `<blob ${value.length} bytes>`;
  return String(value);
}

const STYLE = `
  body { font-family: system-ui, sans-serif; margin: 2rem; color: #1f2933; }
  table { border-collapse: collapse; font-size: 0.85rem; }
  th, td { border: 1px solid #cbd2d9; padding: 0.25rem 0.5rem; text-align: left; }
  th { background: #f0f4f8; }
  nav a { margin-right: 1rem; }
  .muted { color: #7b8794; }
`;

export function renderLayout(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>${STYLE}</style>
</head>
<body>
<nav><a href="/">Tables</a><a href="/query">Query</a><a href="/api/stats">Stats (JSON)</a></nav>
<h1>${escapeHtml(title)}</h1>
${body}
</body>
</html>
`;
}

export function renderIndexPage(tables: TableInfo[], stats: DatabaseStats): string {
  const rows = tables
    .map(
      (table) => `<tr>
  <td><a href="/tables/${encodeURIComponent(table.name)}">${escapeHtml(table.name)}</a></td>
  <td>${escapeHtml(table.kind)}</td>
  <td>${escapeHtml(table.device ?? '')}</td>
  <td>${escapeHtml(table.description ?? '')}</td>
  <td>${table.rowCount}</td>
</tr>`
    )
    .join('\n');

  const body = `<p>${stats.totalParticipants} participants, ${stats.sensorStats.length} loaded streams, ${stats.totalSensorTypes} documented streams.</p>
<table>
<thead><tr><th>Table</th><th>Kind</th><th>Device</th><th>Description</th><th>Rows</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>`;

  return renderLayout('Wearable sensor catalog', body);
}

export interface TablePageInput {
  table: string;
  result: QueryResult;
  totalRows: number;
  page: number;
  pageSize: number;
  filter: RowFilter;
}

function pageLink(input: TablePageInput, page: number, label: string): string {
  const params = new URLSearchParams({ page: String(page), pageSize: String(input.pageSize) });
  if (input.filter.participantId !== undefined) params.set('participant', input.filter.participantId);
  if (input.filter.sessionId !== undefined) params.set('session', input.filter.sessionId);
  return `<a href="/tables/${encodeURIComponent(input.table)}?${escapeHtml(params.toString())}">${label}</a>`;
}

function renderRows(result: QueryResult): { header: string; body: string } {
  const header = result.columns.map((column) => `<th>${escapeHtml(column)}</th>`).join('');
  const body = result.rows
    .map(
      (row) =>
        `<tr>${result.columns
          .map((column) => `<td>${escapeHtml(formatCell(row[column] ?? null))}</td>`)
          .join('')}</tr>`
    )
    .join('\n');
  return { header, body };
}

export function renderTablePage(input: TablePageInput): string {
  const { result, totalRows, page, pageSize } = input;
  const pageCount = Math.max(1, Math.ceil(totalRows / pageSize));
  const { header, body } = renderRows(result);

  const navigation = [
    page > 1 ? pageLink(input, page - 1, 'Previous') : '',
    `<span class="muted">Page ${page} of ${pageCount}</span>`,
    page < pageCount ? pageLink(input, page + 1, 'Next') : '',
  ]
    .filter((part) => part !== '')
    .join(' ');

  const content = `<p>${totalRows} rows</p>
<p>${navigation}</p>
<table data-total-rows="${totalRows}">
<thead><tr>${header}</tr></thead>
<tbody>
${body}
</tbody>
</table>`;

  return renderLayout(input.table, content);
}

function renderQueryForm(sql: string): string {
  return `<form method="get" action="/query">
<textarea name="sql" rows="4" cols="80">${escapeHtml(sql)}</textarea>
<p><button type="submit">Run</button></p>
</form>`;
}

/**
 * Form for a read-only statement, with its result when one was run
 */
export function renderQueryPage(sql: string, result: QueryResult | null, errors: string[] = []): string {
  const parts = [renderQueryForm(sql)];

  if (errors.length > 0) {
    parts.push(`<ul>${errors.map((message) => `<li>${escapeHtml(message)}</li>`).join('')}</ul>`);
  }

  if (result) {
    const { header, body } = renderRows(result);
    const count = result.truncated
      ? `First ${result.rows.length} rows; the result has more`
      : `${result.rows.length} rows`;
    parts.push(`<p>${count}</p>
<table data-total-rows="${result.rows.length}">
<thead><tr>${header}</tr></thead>
<tbody>
${body}
</tbody>
</table>`);
  }

  return renderLayout('Query', parts.join('\n'));
}

export function renderNotFoundPage(table: string): string {
  return renderLayout(
    'Table not found',
    `<p>No table named <code>${escapeHtml(table)}</code> exists in this catalog.</p>`
  );
}

export function renderErrorPage(title: string, messages: string[]): string {
  return renderLayout(
    title,
    `<ul>${messages.map((message) => `<li>${escapeHtml(message)}</li>`).join('')}</ul>`
  );
}
