import { mkdirSync } from "node:fs";
import { resolve } from "node:path";
import pino from "pino";
import { createStream } from "rotating-file-stream";
import type { AppConfig } from "./config";

export interface Loggers {
  app: pino.Logger;
  audit: pino.Logger;
  close(): Promise<void>;
}

export function createLoggers(config: AppConfig): Loggers {
  const resolvedLogDir = resolve(config.logDir);
  mkdirSync(resolvedLogDir, { recursive: true });

  const appStream = createStream("app.log", {
    interval: "1d",
    size: "10M",
    rotate: 30,
    path: resolvedLogDir,
    compress: "gzip",
  });

  const auditStream = createStream("audit.log", {
    interval: "1d",
    size: "10M",
    rotate: 60,
    path: resolvedLogDir,
    compress: "gzip",
  });

  const app = pino(
    {
      level: config.logLevel,
      base: {
        service: "prompt-sieve",
        profile: config.profile,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    appStream,
  );

  const audit = pino(
    {
      level: config.logLevel,
      base: {
        service: "prompt-sieve-audit",
        profile: config.profile,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    auditStream,
  );

  const close = async (): Promise<void> => {
    await Promise.all(
      [appStream, auditStream].map(
        (stream) => new Promise<void>((resolveEnd) => stream.end(() => resolveEnd())),
      ),
    );
  };

  return { app, audit, close };
}
