export class ParseError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`Failed to parse ${filePath}: syntax error at line ${line}, column ${column}`);
    this.name = 'ParseError';
  }
}

export class UnsupportedOutputFormatError extends Error {
  constructor(public readonly format: string) {
    super(`Unknown output format: ${format}. Use print, text or json instead.`);
    this.name = 'UnsupportedOutputFormatError';
  }
}
