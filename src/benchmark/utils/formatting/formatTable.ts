export type ColumnAlignment = 'left' | 'right';

/**
 * Format tabular data as a human-readable, bordered text table.
 *
 * Example output:
 * ```
 * ┌──────┬──────────────────┬───────────┐
 * │ mass │ formula          │ peakCount │
 * ├──────┼──────────────────┼───────────┤
 * │ 1000 │ C44H95N12O13     │         7 │
 * └──────┴──────────────────┴───────────┘
 * ```
 * @param headers - Column header labels.
 * @param rows - Array of row arrays (each row has the same length as headers).
 * @param alignments - Alignment of each column, left when missing. Headers
 * follow the alignment of their column.
 * @returns The formatted table as a multi-line string.
 */
export function formatTable(
  headers: string[],
  rows: string[][],
  alignments: ColumnAlignment[] = [],
): string {
  const widths = headers.map((h, col) =>
    Math.max(h.length, ...rows.map((row) => (row[col] ?? '').length)),
  );

  const pad = (text: string, col: number): string => {
    const fill = ' '.repeat(Math.max(0, (widths[col] ?? 0) - text.length));
    return alignments[col] === 'right' ? fill + text : text + fill;
  };

  const border = (left: string, join: string, right: string): string =>
    `${left}${widths.map((w) => '─'.repeat(w + 2)).join(join)}${right}`;

  const formatRow = (cells: string[]): string =>
    `│ ${headers.map((_, col) => pad(cells[col] ?? '', col)).join(' │ ')} │`;

  return [
    border('┌', '┬', '┐'),
    formatRow(headers),
    border('├', '┼', '┤'),
    ...rows.map((row) => formatRow(row)),
    border('└', '┴', '┘'),
  ].join('\n');
}
