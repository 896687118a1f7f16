import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

type AppLoggerParams = {
  stateDir: string;
  label?: string;
};

/** JSON-lines log under `<stateDir>/logs`, one file per invocation. */
export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const dir = path.join(params.stateDir, "logs");
  await mkdir(dir, { recursive: true });
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const label = params.label ?? "review";
  const filePath = path.join(dir, `${label}-${timestamp}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  let closed = false;

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (closed) return;
    const payload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta: meta ?? undefined
    };
    stream.write(`${JSON.stringify(payload)}\n`);
  };

  // The stream stops accepting writes after an error; console output carries on.
  stream.on("error", () => {
    closed = true;
  });

  const close = async () => {
    if (closed) return;
    closed = true;
    await new Promise<void>((resolve) => stream.end(resolve));
  };

  return {
    path: filePath,
    close,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}

type UiLoggerParams = {
  appLogger: Logger;
  verbose?: boolean;
  print?: (line: string) => void;
};

/**
 * Mirrors every entry to the app log and prints info and above to the console,
 * colored by level. Debug entries reach the console only when `verbose`.
 */
export function createUiLogger(params: UiLoggerParams): Logger {
  const print = params.print ?? ((line: string) => console.log(line));
  const { appLogger } = params;
  return {
    debug: (message, meta) => {
      appLogger.debug(message, meta);
      if (params.verbose) print(pc.dim(message));
    },
    info: (message, meta) => {
      appLogger.info(message, meta);
      print(message);
    },
    warn: (message, meta) => {
      appLogger.warn(message, meta);
      print(pc.yellow(message));
    },
    error: (message, meta) => {
      appLogger.error(message, meta);
      print(pc.red(message));
    }
  };
}
