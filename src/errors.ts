export class CongressDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class OutOfRangeError extends CongressDataError {
  constructor(public readonly value: number) {
    super(`${value} is not a known Congress number`);
  }
}

/**
 * Thrown when a range could be read both as Congress numbers and as years,
 * e.g. 50..1990.
 */
export class InvalidRangeError extends CongressDataError {
  constructor(
    public readonly start: number,
    public readonly end: number
  ) {
    super(`Ranges that begin before 1786 but end afterwards are invalid (${start}..${end})`);
  }
}

export class TokenFetchError extends CongressDataError {
  constructor(url: string) {
    super(`No __RequestVerificationToken found on ${url}`);
  }
}

export class ConnectionError extends CongressDataError {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(
      attempts > 1
        ? `Failed to reach ${url} after ${attempts} attempts`
        : `Failed to reach ${url}`,
      options
    );
  }
}

export class HttpStatusError extends CongressDataError {
  constructor(
    public readonly url: string,
    public readonly status: number
  ) {
    super(`HTTP ${status} for ${url}`);
  }
}

// JSON that does not parse or does not have the expected shape
export class InvalidResponseError extends CongressDataError {
  constructor(
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Unexpected response from ${url}`, options);
  }
}

export class XmlParseError extends CongressDataError {
  constructor(
    public readonly url: string,
    detail: string
  ) {
    super(`Unable to parse XML from ${url}: ${detail}`);
  }
}

export class InvalidRecordError extends CongressDataError {
  constructor(
    public readonly record: 'term' | 'member' | 'congress',
    public readonly problems: string[]
  ) {
    super(`Invalid ${record} record: ${problems.join(', ')}`);
  }
}

export class InvalidOptionError extends CongressDataError {
  constructor(
    public readonly option: 'position' | 'party' | 'state',
    public readonly value: string
  ) {
    super(`${value} is not a valid ${option}`);
  }
}

export class InvalidPositionError extends InvalidOptionError {
  constructor(value: string) {
    super('position', value);
  }
}

export class InvalidPartyError extends InvalidOptionError {
  constructor(value: string) {
    super('party', value);
  }
}

export class InvalidStateError extends InvalidOptionError {
  constructor(value: string) {
    super('state', value);
  }
}

export class AbortError extends CongressDataError {
  constructor(options?: { cause?: unknown }) {
    super('Operation aborted', options);
  }
}
