export class InvalidJobUrlError extends Error {
  constructor(readonly url: string) {
    super('Invalid URL format. URL must start with http:// or https://');
    this.name = 'InvalidJobUrlError';
  }
}

/** The caller gave up on the request; no partial record is produced. */
export class AnalysisAbortedError extends Error {
  constructor(message = 'Aborted') {
    super(message);
    this.name = 'AnalysisAbortedError';
  }
}
