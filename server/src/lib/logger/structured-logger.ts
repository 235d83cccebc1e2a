/**
 * Structured Logger with Pino
 *
 * - JSON logging with Pino
 * - Daily rotated log files (opt-in via LOG_TO_FILE)
 * - Pretty console output in DEV
 * - Automatic secret redaction
 * - Request/thread tracking via child loggers
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

let fileStream: rfs.RotatingFileStream | undefined;
if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  fileStream = rfs.createStream('server.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

const streams: pino.StreamEntry[] = [];

if (config.console) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: config.pretty
      ? pinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}

if (fileStream) {
  streams.push({
    level: config.level === 'silent' ? 'fatal' : config.level,
    stream: fileStream,
  });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = typeof logger;
