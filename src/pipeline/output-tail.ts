/** Last lines of a diagnostic stream, kept for error reports. */
export class OutputTail {
  private readonly lines: string[] = [];

  constructor(private readonly maxLines = 40) {}

  push(line: string): void {
    const trimmed = line.trimEnd();
    if (trimmed === '') {
      return;
    }
    this.lines.push(trimmed);
    if (this.lines.length > this.maxLines) {
      this.lines.shift();
    }
  }

  toString(): string {
    return this.lines.join('\n');
  }
}
