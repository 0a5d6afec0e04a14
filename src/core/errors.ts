export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingColumnsError extends AppError {
  constructor(public readonly columns: string[]) {
    super(`Bars are missing required columns: ${columns.join(', ')}`, 'MISSING_COLUMNS', { columns });
  }
}

export class InvalidBarsError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_BARS', details);
  }
}

export class NoPredictionsAvailableError extends AppError {
  constructor(symbol: string, timeframe: string) {
    super(`No predictions available for ${symbol} (${timeframe})`, 'NO_PREDICTIONS_AVAILABLE', {
      symbol,
      timeframe
    });
  }
}

export class InvalidPredictionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_PREDICTION', details);
  }
}
