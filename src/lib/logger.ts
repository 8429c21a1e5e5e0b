import * as ui from "./ui";

/**
 * What the core components report through. The CLI binds it to the
 * terminal printer; background processes get timestamped lines.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
  detail(message: string): void;
}

export const uiLogger: Logger = {
  info: ui.info,
  warn: ui.warning,
  error: ui.error,
  success: ui.success,
  detail: ui.muted,
};

/**
 * Line logger for detached processes whose stdout is a log file
 */
export function createLineLogger(startTime: number = Date.now()): Logger {
  const line = (level: "INFO" | "WARN" | "ERROR", message: string) => {
    const uptime = Math.floor((Date.now() - startTime) / 1000);
    return `[${new Date().toISOString()}] [${level}] [uptime:${uptime}s] ${message}`;
  };

  return {
    info: (message) => console.log(line("INFO", message)),
    success: (message) => console.log(line("INFO", message)),
    detail: (message) => console.log(line("INFO", message)),
    warn: (message) => console.log(line("WARN", message)),
    error: (message) => console.error(line("ERROR", message)),
  };
}
