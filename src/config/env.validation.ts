import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { Type } from 'class-transformer';

export const EMBEDDING_PROVIDERS = ['openai', 'ollama', 'google'] as const;
export const LLM_PROVIDERS = ['anthropic', 'openai', 'ollama'] as const;
export const INDEX_COMPLETION_POLICIES = ['strict', 'always'] as const;

export type IndexCompletionPolicy = (typeof INDEX_COMPLETION_POLICIES)[number];

/**
 * Environment schema. Only keys whose format matters are declared;
 * everything else is read with defaults through ConfigService.
 */
export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsString()
  LOG_DIR?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  DB_PORT?: number;

  @IsOptional()
  @IsString()
  QDRANT_URL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  CHUNK_SIZE?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  CHUNK_OVERLAP?: number;

  @IsOptional()
  @IsIn(EMBEDDING_PROVIDERS)
  EMBEDDING_PROVIDER?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  EMBEDDING_DIMENSIONS?: number;

  @IsOptional()
  @IsIn(LLM_PROVIDERS)
  LLM_PROVIDER?: string;

  @IsOptional()
  @IsIn(INDEX_COMPLETION_POLICIES)
  INDEX_COMPLETION_POLICY?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  MAX_FILE_SIZE_MB?: number;
}

export function validate(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: false,
  });
  const errors = validateSync(validated, { skipMissingProperties: true });

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  // Keep unknown keys (API keys, model names) untouched
  return { ...config, ...validated };
}

/**
 * Parse a numeric config value that may arrive as a string from the env file
 */
export function toNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

export function isIndexCompletionPolicy(
  value: unknown,
): value is IndexCompletionPolicy {
  return INDEX_COMPLETION_POLICIES.some((policy) => policy === value);
}
