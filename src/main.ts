#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Command, executeCommand, logLevelsFor, parseCommand, USAGE } from './cli';
import { toErrorMessage } from './common/errors';

const logger = new Logger('Main');

async function bootstrap(): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (err) {
    process.stderr.write(`${toErrorMessage(err)}\n\n${USAGE}\n`);
    return 2;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFor(process.env.LOG_LEVEL),
  });
  try {
    return await executeCommand(app, command);
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error(`Startup failed: ${toErrorMessage(err)}`);
    process.exitCode = 1;
  });
