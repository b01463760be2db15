// src/lib/log.ts
// Console logging with a bracketed scope, e.g. "[advisor] request failed".
export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(v: string | undefined): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

export type Logger = Record<LogLevel, (message: string, ...data: unknown[]) => void>;

export function createLogger(scope: string, level: string | undefined = process.env.LOG_LEVEL): Logger {
  const min = ORDER[isLevel(level) ? level : "info"];
  const emit = (lvl: LogLevel) => (message: string, ...data: unknown[]) => {
    if (ORDER[lvl] < min) return;
    const line = `[${scope}] ${message}`;
    if (lvl === "error") console.error(line, ...data);
    else if (lvl === "warn") console.warn(line, ...data);
    else if (lvl === "info") console.info(line, ...data);
    else console.debug(line, ...data);
  };
  return { debug: emit("debug"), info: emit("info"), warn: emit("warn"), error: emit("error") };
}
