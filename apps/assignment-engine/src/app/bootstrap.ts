import { INestApplicationContext, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule, EngineModuleOptions } from './app.module';
import { EngineLogLevel, validateEnv } from './config/env.validation';

const LOG_LEVELS: Record<EngineLogLevel, LogLevel[]> = {
  debug: ['debug', 'log', 'warn', 'error'],
  log: ['log', 'warn', 'error'],
  warn: ['warn', 'error'],
  error: ['error']
};

export interface EngineContextOptions extends EngineModuleOptions {
  /** Overrides LOG_LEVEL; false silences the engine */
  logger?: LogLevel[] | false;
}

/**
 * Boot the engine as a standalone application context (no HTTP listener).
 * Callers resolve services with `context.get(...)` and `close()` it when done.
 */
export async function createEngineContext(
  options: EngineContextOptions = {}
): Promise<INestApplicationContext> {
  const env = validateEnv({ ...process.env, ...options.env });
  const { logger, ...moduleOptions } = options;

  return NestFactory.createApplicationContext(AppModule.forRoot(moduleOptions), {
    logger: logger ?? LOG_LEVELS[env.LOG_LEVEL]
  });
}
