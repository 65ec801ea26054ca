export type SignalEngineErrorCode =
  | 'INVALID_SNAPSHOT'
  | 'INVALID_RISK_INPUT'
  | 'CONFIGURATION'
  | 'INSUFFICIENT_HISTORY';

export class SignalEngineError extends Error {
  constructor(
    readonly code: SignalEngineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidSnapshotError extends SignalEngineError {
  constructor(readonly issues: string[]) {
    super('INVALID_SNAPSHOT', `Invalid indicator snapshot: ${issues.join('; ')}`);
  }
}

export class InvalidRiskInputError extends SignalEngineError {
  constructor(message: string) {
    super('INVALID_RISK_INPUT', message);
  }
}

export class ConfigurationError extends SignalEngineError {
  constructor(readonly issues: string[]) {
    super('CONFIGURATION', `Invalid signal engine configuration: ${issues.join('; ')}`);
  }
}

export class InsufficientHistoryError extends SignalEngineError {
  constructor(
    readonly required: number,
    readonly received: number,
  ) {
    super('INSUFFICIENT_HISTORY', `Need at least ${required} closed bars, got ${received}`);
  }
}
