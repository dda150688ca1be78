export class LoggerInitError extends Error {
  constructor(message = 'Initializing logger failed. Was another logger already initialized?') {
    super(message);
    this.name = 'LoggerInitError';
  }
}

export class LoggerConfigError extends Error {
  constructor(
    message: string,
    readonly variable: string,
  ) {
    super(message);
    this.name = 'LoggerConfigError';
  }
}
