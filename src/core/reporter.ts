/**
 * Layout Presenter
 *
 * Renders layouts as a console table, JSON or Markdown.
 * Every format shows the same columns: Date, Title, Notes, Author.
 */

import chalk from 'chalk';
import { LayoutRecord, OutputFormat } from './types';

// ─── Columns ────────────────────────────────────────────────────────────────

const HEADERS = ['Date', 'Title', 'Notes', 'Author'] as const;

/** Longest cell the console table prints before truncating */
export const MAX_CELL_WIDTH = 60;

/**
 * Publication date as M/D/YY, in UTC.
 */
export function formatDate(createdAt: number): string {
  const date = new Date(createdAt * 1000);
  const year = String(date.getUTCFullYear() % 100).padStart(2, '0');
  return `${date.getUTCMonth() + 1}/${date.getUTCDate()}/${year}`;
}

export function layoutRow(layout: LayoutRecord): string[] {
  return [formatDate(layout.createdAt), layout.title, layout.notes, layout.creator];
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

// Widths count code points, so an emoji is never split into a lone surrogate.
function codePointLength(value: string): number {
  return [...value].length;
}

function truncate(value: string, max: number): string {
  const chars = [...value];
  return chars.length > max ? `${chars.slice(0, max - 3).join('')}...` : value;
}

function pad(value: string, width: number): string {
  return value + ' '.repeat(Math.max(0, width - codePointLength(value)));
}

// ─── Format Layouts ─────────────────────────────────────────────────────────

export function formatLayouts(layouts: LayoutRecord[], format: OutputFormat): string {
  switch (format) {
    case 'table':
      return formatTable(layouts);
    case 'json':
      return formatJson(layouts);
    case 'markdown':
      return formatMarkdown(layouts);
    default:
      return formatTable(layouts);
  }
}

// ─── Table Format ───────────────────────────────────────────────────────────

function formatTable(layouts: LayoutRecord[]): string {
  if (layouts.length === 0) return '📭 No layouts found.';

  const header = HEADERS.map((h) => h.toUpperCase());
  const rows = layouts.map((layout) =>
    layoutRow(layout).map((cell) => truncate(collapseWhitespace(cell), MAX_CELL_WIDTH))
  );

  const widths = header.map((h, col) =>
    Math.max(codePointLength(h), ...rows.map((row) => codePointLength(row[col])))
  );
  const border = `+${widths.map((w) => '-'.repeat(w + 2)).join('+')}+`;
  const line = (cells: string[]) =>
    `| ${cells.map((cell, col) => pad(cell, widths[col])).join(' | ')} |`;

  const lines: string[] = [];
  lines.push(border);
  lines.push(chalk.bold(line(header)));
  lines.push(border);
  for (const row of rows) {
    lines.push(line(row));
  }
  lines.push(border);

  return lines.join('\n');
}

// ─── JSON Format ────────────────────────────────────────────────────────────

function formatJson(layouts: LayoutRecord[]): string {
  return JSON.stringify(layouts, null, 2);
}

// ─── Markdown Format ────────────────────────────────────────────────────────

function escapeMarkdownCell(value: string): string {
  return collapseWhitespace(value).replace(/\|/g, '\\|');
}

function formatMarkdown(layouts: LayoutRecord[]): string {
  const lines: string[] = [];
  lines.push(`| ${HEADERS.join(' | ')} |`);
  lines.push(`|${HEADERS.map(() => '------').join('|')}|`);

  for (const layout of layouts) {
    lines.push(`| ${layoutRow(layout).map(escapeMarkdownCell).join(' | ')} |`);
  }

  return lines.join('\n');
}
