// Environment-backed application config, validated once at startup

import { Injectable, type LogLevel } from '@nestjs/common';
import { z } from 'zod';

const LOG_LEVELS = [
  'verbose',
  'debug',
  'log',
  'warn',
  'error',
  'fatal',
] as const satisfies readonly LogLevel[];

const AppEnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  /** Comma-separated Nest log levels */
  LOG_LEVELS: z
    .string()
    .default('log,warn,error')
    .transform((raw) =>
      raw
        .split(',')
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
    )
    .pipe(z.array(z.enum(LOG_LEVELS))),
  APP_VERSION: z.string().min(1).default('0.1.0'),
});

export interface AppConfig {
  port: number;
  host: string;
  logLevels: LogLevel[];
  /** Reported by GET / */
  version: string;
}

export function loadAppConfig(
  env: Record<string, string | undefined>,
): AppConfig {
  const result = AppEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const { PORT, HOST, LOG_LEVELS: logLevels, APP_VERSION } = result.data;
  return { port: PORT, host: HOST, logLevels, version: APP_VERSION };
}

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  constructor() {
    this.config = loadAppConfig(process.env);
  }

  get(): AppConfig {
    return this.config;
  }
}
