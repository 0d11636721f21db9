/**
 * CLI output helpers.
 *
 * Plain text through process.stdout/stderr.write so tests can spy on it.
 */
export const output = {
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write(`OK: ${message}\n`)
  },

  /** To stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write(`Error: ${message}\n`)
  },

  /** To stderr, prefixed with "Warning:". */
  warn(message: string): void {
    process.stderr.write(`Warning: ${message}\n`)
  },

  /** Column-aligned table; the keys of the first row are the headers. */
  table(rows: Record<string, string>[]): void {
    if (rows.length === 0) return
    const keys = Object.keys(rows[0])
    const widths = keys.map((k) => Math.max(k.length, ...rows.map((row) => (row[k] ?? '').length)))
    const format = (cells: string[]) => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd()

    process.stdout.write(format(keys) + '\n')
    process.stdout.write(widths.map((w) => '-'.repeat(w)).join('  ') + '\n')
    for (const row of rows) {
      process.stdout.write(format(keys.map((k) => row[k] ?? '')) + '\n')
    }
  },
}
