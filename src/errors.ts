/**
 * Domain errors for the download and parse stages
 */

export class FetchError extends Error {
  code = "FETCH_ERROR" as const;
  regionCode: number;
  status?: number;

  constructor(message: string, regionCode: number, status?: number) {
    super(message);
    this.name = "FetchError";
    this.regionCode = regionCode;
    this.status = status;
  }
}

export class ParseError extends Error {
  code = "PARSE_ERROR" as const;
  fileName: string;
  line?: number;

  constructor(message: string, fileName: string, line?: number) {
    super(
      line !== undefined
        ? `${fileName}:${String(line)}: ${message}`
        : `${fileName}: ${message}`
    );
    this.name = "ParseError";
    this.fileName = fileName;
    this.line = line;
  }
}
