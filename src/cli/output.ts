/**
 * Output primitives for the CLI. Program output goes to stdout; errors and
 * diagnostics go to stderr, next to the log lines.
 */

export type OutputFormat = 'text' | 'json'

export const out = {
  line: (text: string = ''): void => {
    process.stdout.write(text + '\n')
  },

  /** Pretty-printed JSON for `--format json` */
  json: (value: unknown): void => {
    process.stdout.write(JSON.stringify(value, null, 2) + '\n')
  },
}

export const err = {
  line: (text: string = ''): void => {
    process.stderr.write(text + '\n')
  },
}
