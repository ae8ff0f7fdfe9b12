export interface OutputOptions {
  json: boolean;
  color: boolean;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export class Output {
  private readonly out: (text: string) => void;
  private readonly err: (text: string) => void;

  constructor(private readonly options: OutputOptions) {
    this.out = options.stdout ?? (text => process.stdout.write(text + '\n'));
    this.err = options.stderr ?? (text => process.stderr.write(text + '\n'));
  }

  get isJson(): boolean {
    return this.options.json;
  }

  log(message: string): void {
    if (!this.options.json) {
      this.out(message);
    }
  }

  json(data: unknown): void {
    this.out(JSON.stringify(data, null, 2));
  }

  error(message: string): void {
    if (this.options.json) {
      this.json({ error: message });
    } else {
      this.err(this.formatError(message));
    }
  }

  success(message: string): void {
    if (!this.options.json) {
      this.out(`✓ ${message}`);
    }
  }

  warn(message: string): void {
    if (!this.options.json) {
      this.err(`⚠ ${message}`);
    }
  }

  table(headers: string[], rows: string[][]): string {
    if (rows.length === 0) {
      return '';
    }

    // Calculate column widths
    const colWidths = headers.map((header, i) =>
      Math.max(header.length, ...rows.map(row => (row[i] ?? '').length))
    );

    const line = (cells: string[]): string =>
      cells.map((cell, i) => cell.padEnd(colWidths[i] ?? 0)).join('  ').trimEnd();

    const separator = colWidths.map(width => '-'.repeat(width)).join('  ');

    return [line(headers), separator, ...rows.map(line)].join('\n');
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
  };

  return new Output({ ...defaults, ...options });
}
