import { Transform } from 'class-transformer';
import {
  IsIn,
  IsNotEmpty,
  IsString,
  Validate,
  ValidationArguments,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';
import { RequestValidationError } from '../../common/errors';
import { DURATION_KEYWORDS, DurationKeyword, isDurationKeyword } from '../window';

export const DEFAULT_SIZE = '480x480';
export const DEFAULT_DURATION: DurationKeyword = 'day';
export const MIN_DIMENSION = 100;
export const MAX_DIMENSION = 2000;

export interface ChartSize {
  width: number;
  height: number;
}

/** `WIDTHxHEIGHT` with decimal integers, or null. Bounds are not checked. */
export function parseSize(value: string): ChartSize | null {
  const m = /^(\d+)x(\d+)$/.exec(value);
  if (!m) return null;
  return { width: Number(m[1]), height: Number(m[2]) };
}

export function isSizeInBounds({ width, height }: ChartSize): boolean {
  const ok = (n: number) => n >= MIN_DIMENSION && n <= MAX_DIMENSION;
  return ok(width) && ok(height);
}

export const INVALID_SIZE_FORMAT = 'Invalid size format. Use WIDTHxHEIGHT (e.g., 480x480)';
export const SIZE_OUT_OF_BOUNDS = `Size must be between ${MIN_DIMENSION}x${MIN_DIMENSION} and ${MAX_DIMENSION}x${MAX_DIMENSION}`;

/** Parse and bounds-check a size parameter; throws the message a caller should see. */
export function readSize(value: unknown): ChartSize {
  const size = typeof value === 'string' ? parseSize(value) : null;
  if (!size) throw new RequestValidationError(INVALID_SIZE_FORMAT);
  if (!isSizeInBounds(size)) throw new RequestValidationError(SIZE_OUT_OF_BOUNDS);
  return size;
}

@ValidatorConstraint({ name: 'chartSize' })
export class ChartSizeConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    const size = typeof value === 'string' ? parseSize(value) : null;
    return size !== null && isSizeInBounds(size);
  }

  defaultMessage(args: ValidationArguments): string {
    return typeof args.value === 'string' && parseSize(args.value)
      ? SIZE_OUT_OF_BOUNDS
      : INVALID_SIZE_FORMAT;
  }
}

const normalize =
  (fn: (s: string) => string) =>
  ({ value }: { value: unknown }) =>
    typeof value === 'string' ? fn(value.trim()) : value;

/**
 * DTO for chart query parameters.
 * Properties are declared in the order errors are reported: ticker, size, duration.
 */
export class SparkQueryDto {
  @Transform(normalize((s) => s.toUpperCase()))
  @IsString({ message: 'Missing required parameter: ticker' })
  @IsNotEmpty({ message: 'Missing required parameter: ticker' })
  ticker: string = '';

  @Transform(normalize((s) => s.toLowerCase()))
  @Validate(ChartSizeConstraint)
  size: string = DEFAULT_SIZE;

  @Transform(normalize((s) => s.toLowerCase()))
  @IsIn(DURATION_KEYWORDS, {
    message: ({ value }: ValidationArguments) => `Invalid duration: ${String(value)}`,
  })
  duration: string = DEFAULT_DURATION;
}

/** Validated chart request with the size split into pixels. */
export interface ChartRequest extends ChartSize {
  ticker: string;
  duration: DurationKeyword;
}

export function toChartRequest(query: SparkQueryDto): ChartRequest {
  const { ticker, duration } = query;
  if (!isDurationKeyword(duration)) {
    throw new RequestValidationError(`Invalid duration: ${duration}`);
  }
  return { ticker, duration, ...readSize(query.size) };
}
