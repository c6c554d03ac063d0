/**
 * Render a markdown table. Columns are padded to their widest cell so the
 * source reads as a table too.
 *
 * @example
 *   renderDocTable(['Provider', 'installable'], [['apt', '*X*']])
 *   // | Provider | installable |
 *   // | -------- | ----------- |
 *   // | apt      | *X*         |
 */
export function renderDocTable(
  headers: ReadonlyArray<string>,
  rows: ReadonlyArray<ReadonlyArray<string>>,
): string {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? '').length)),
  );
  const line = (cells: ReadonlyArray<string>): string =>
    `| ${widths.map((width, i) => (cells[i] ?? '').padEnd(width)).join(' | ')} |`;

  return (
    [line(headers), `| ${widths.map((w) => '-'.repeat(w)).join(' | ')} |`, ...rows.map(line)].join(
      '\n',
    ) + '\n'
  );
}
