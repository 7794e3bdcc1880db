/**
 * Grid table rendering
 *
 * +---------+---------+
 * | Header  | Header  |
 * +=========+=========+
 * |       1 | cell    |
 * +---------+---------+
 */

export type ColumnAlign = 'left' | 'right';

function pad(text: string, width: number, align: ColumnAlign): string {
  return align === 'right' ? text.padStart(width) : text.padEnd(width);
}

/**
 * Render rows as a grid; columns without an alignment are left aligned
 */
export function renderGridTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  align: readonly ColumnAlign[] = []
): string {
  const widths = headers.map((header, col) =>
    rows.reduce((max, row) => Math.max(max, (row[col] ?? '').length), header.length)
  );

  const border = (char: string) => `+${widths.map((w) => char.repeat(w + 2)).join('+')}+`;
  const renderRow = (cells: readonly string[]) =>
    `| ${widths.map((w, col) => pad(cells[col] ?? '', w, align[col] ?? 'left')).join(' | ')} |`;

  const lines = [border('-'), renderRow(headers), border('=')];
  for (const row of rows) {
    lines.push(renderRow(row), border('-'));
  }
  if (rows.length === 0) {
    lines.pop();
    lines.push(border('-'));
  }

  return lines.join('\n');
}
