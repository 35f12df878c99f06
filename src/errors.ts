export class InputDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputDecodeError';
  }
}

export class AnalysisFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AnalysisFormatError';
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
