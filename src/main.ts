#!/usr/bin/env node

import 'reflect-metadata';
import { CommandFactory } from 'nest-commander';
import { DictionaryModule } from './dictionary/dictionary.module';
import { resolveLogLevels } from './logger-levels';

async function bootstrap() {
  await CommandFactory.run(DictionaryModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
}

bootstrap().catch((error: unknown) => {
  console.error('Error starting dictionary:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
