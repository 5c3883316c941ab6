export class JobInsertFailedError extends Error {
  constructor() {
    super('Job insert did not return a row');
    this.name = 'JobInsertFailedError';
  }
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: number) {
    super(`Job with id ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid api configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}
