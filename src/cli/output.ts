export interface OutputOptions {
  json: boolean;
  color: boolean;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export class Output {
  constructor(private options: OutputOptions) {}

  get isJson(): boolean {
    return this.options.json;
  }

  log(message: string): void {
    if (!this.options.json) {
      this.options.stdout(message);
    }
  }

  json(data: unknown): void {
    this.options.stdout(JSON.stringify(data, null, 2));
  }

  error(message: string, details?: Record<string, unknown>): void {
    if (this.options.json) {
      this.json({ error: message, ...details });
    } else {
      this.options.stderr(this.formatError(message));
    }
  }

  table(headers: string[], rows: string[][]): string {
    if (rows.length === 0) {
      return '';
    }

    const colWidths = headers.map((header, i) => {
      const maxRowWidth = Math.max(...rows.map(row => (row[i] ?? '').length));
      return Math.max(header.length, maxRowWidth);
    });

    const pad = (cell: string, i: number): string => cell.padEnd(colWidths[i] ?? 0);

    const headerRow = headers.map(pad).join('  ').trimEnd();
    const separator = colWidths.map(width => '-'.repeat(width)).join('  ');
    const dataRows = rows.map(row => headers.map((_, i) => pad(row[i] ?? '', i)).join('  ').trimEnd());

    return [headerRow, separator, ...dataRows].join('\n');
  }

  private formatError(message: string): string {
    if (this.options.color) {
      return `\x1b[31mError:\x1b[0m ${message}`;
    }
    return `Error: ${message}`;
  }
}

export function createOutput(options: Partial<OutputOptions> = {}): Output {
  const defaults: OutputOptions = {
    json: false,
    color: process.stdout.isTTY === true,
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  };

  return new Output({ ...defaults, ...options });
}
