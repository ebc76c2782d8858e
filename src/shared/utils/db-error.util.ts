import { QueryFailedError } from 'typeorm';
import { isJsonObject } from './json.util';

const PG_UNIQUE_VIOLATION = '23505';

export const isUniqueViolation = (error: unknown): boolean =>
  error instanceof QueryFailedError &&
  isJsonObject(error.driverError) &&
  error.driverError.code === PG_UNIQUE_VIOLATION;
