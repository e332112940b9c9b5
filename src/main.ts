#!/usr/bin/env node
import 'reflect-metadata';
import { INestApplicationContext } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { CliLogger, LogFlags, resolveLogLevels } from './cli/cli-logger';
import { createProgram } from './cli/program';

async function createContext(flags: LogFlags): Promise<INestApplicationContext> {
  // Keep Nest's own startup lines out of the way until LOG_LEVEL is known
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: new CliLogger('txpool', { logLevels: ['fatal', 'error', 'warn'] }),
  });

  const configService = app.get(ConfigService);
  app.useLogger(
    new CliLogger('txpool', {
      logLevels: resolveLogLevels(configService.get<string>('LOG_LEVEL'), flags),
    }),
  );
  return app;
}

async function bootstrap() {
  const program = createProgram({
    createContext,
    write: (text) => {
      process.stdout.write(`${text}\n`);
    },
    fail: (message) => {
      process.stderr.write(`Error: ${message}\n`);
      process.exitCode = 1;
    },
  });

  await program.parseAsync(process.argv);
}

bootstrap().catch((error) => {
  console.error('Error during bootstrap:', error);
  process.exit(1);
});
