/**
 * The feed endpoint answered with something other than 200, or the request
 * failed before any status came back (status is then null).
 */
export class FetchError extends Error {
  constructor(
    public readonly status: number | null,
    message?: string,
  ) {
    super(message ?? (status === null ? 'Live feed request failed' : `Live feed returned status ${status}`));
    this.name = 'FetchError';
  }
}

/**
 * A required element or attribute of the feed is missing or malformed.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly datapath?: string,
  ) {
    super(datapath !== undefined ? `${message} (datapath ${datapath})` : message);
    this.name = 'ParseError';
  }

  withDatapath(datapath: string): ParseError {
    return this.datapath !== undefined ? this : new ParseError(this.message, datapath);
  }
}
