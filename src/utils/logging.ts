import pino from 'pino';
import { Writable } from 'stream';
import { loadConfig } from '../config/index.js';

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    const cfg = loadConfig();
    loggerInstance = pino({
      level: cfg.logging.level,
      transport: cfg.logging.json ? undefined : { target: 'pino-pretty' },
    });
  }
  return loggerInstance;
}

// Test-only helper to reset singleton (not exported in production docs)
export function __resetLoggerForTests() {
  loggerInstance = null;
}

// Route the singleton into memory so tests can assert on emitted lines
export function __enableTestLogCollector(level: pino.LevelWithSilent = 'trace'): string[] {
  const logs: string[] = [];
  const sink = new Writable({
    write(chunk, _enc, cb) {
      logs.push(chunk.toString());
      cb();
    },
  });
  loggerInstance = pino({ level }, sink);
  return logs;
}
