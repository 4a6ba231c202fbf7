import { ValidationError } from '../errors';

import type { Dialect } from '../dialect/dialect';
import type { Logger } from '../types';

export function validateIdentifier(name: string, field: string): void {
  if (!name || typeof name !== 'string') {
    throw new ValidationError(`${field} name must be a non-empty string`, field);
  }

  if (name.trim().length === 0) {
    throw new ValidationError(`${field} name cannot be blank`, field);
  }
}

export function validateRowCount(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`, field);
  }
}

export interface BuilderConfigInput {
  dialect: string | Dialect;
  logger?: Logger;
}

export function validateBuilderConfig(
  config: BuilderConfigInput,
  isSupported: (name: string) => boolean,
): void {
  if (!config) {
    throw new ValidationError('Builder configuration is required');
  }

  if (config.logger !== undefined) {
    validateLogger(config.logger);
  }

  if (typeof config.dialect === 'string') {
    if (!isSupported(config.dialect)) {
      throw new ValidationError(`Unsupported dialect: ${config.dialect}`, 'dialect');
    }
    return;
  }

  if (
    !config.dialect ||
    typeof config.dialect.escape !== 'function' ||
    typeof config.dialect.placeholder !== 'function' ||
    typeof config.dialect.reset !== 'function' ||
    typeof config.dialect.getCompiler !== 'function'
  ) {
    throw new ValidationError('Dialect must be a registered name or a Dialect instance', 'dialect');
  }
}

function validateLogger(logger: Logger): void {
  const methods = ['error', 'warn', 'info', 'debug'] as const;
  if (!logger || methods.some((method) => typeof logger[method] !== 'function')) {
    throw new ValidationError('Logger must implement error, warn, info and debug', 'logger');
  }
}
