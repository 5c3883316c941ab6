export class JobNotFoundError extends Error {
  constructor(public readonly jobId: number) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class JobInvalidStateError extends Error {
  constructor(
    public readonly jobId: number,
    public readonly currentStatus: string,
    public readonly expectedStatus: string,
  ) {
    super(
      `Job ${jobId} is not in ${expectedStatus} status (current status: ${currentStatus})`,
    );
    this.name = 'JobInvalidStateError';
  }
}

export class BackendNotRegisteredError extends Error {
  constructor(public readonly backend: string) {
    super(`No enabled adapter registered for backend ${backend}`);
    this.name = 'BackendNotRegisteredError';
  }
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid worker configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

export class BackendRestartError extends Error {
  constructor(
    public readonly backend: string,
    public readonly reason: string,
  ) {
    super(`Restart of backend ${backend} failed: ${reason}`);
    this.name = 'BackendRestartError';
  }
}
