/***
 *
 * Logger - Debug-gated diagnostic output
 *
 * Registries report renumbering, start changes and resets through here,
 * warn on rejected start tags and log a broken density check as an
 * error. Each line is prefixed with the kind it concerns:
 *
 *   [14:03:27] [LOG] [material] retagged 3 entities from 100
 *
 * Output is off unless enabled with configure_logger({ debug: true }).
 * The sink defaults to the console and can be swapped, which is how the
 * tests capture lines.
 *
 ***/

export type LogLevel = "LOG" | "WARN" | "ERROR";

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  debug?: boolean;
  sink?: LogSink;
}

const console_sink: LogSink = (level, line) => {
  switch (level) {
    case "LOG":
      console.debug(line);
      break;
    case "WARN":
      console.warn(line);
      break;
    case "ERROR":
      console.error(line);
      break;
  }
};

const configuration: { debug: boolean; sink: LogSink } = {
  debug: false,
  sink: console_sink,
};

export function configure_logger(options: LoggerOptions): void {
  if (options.debug !== undefined) configuration.debug = options.debug;
  if (options.sink !== undefined) configuration.sink = options.sink;
}

/** Restore the defaults: debug off, console sink. */
export function reset_logger(): void {
  configuration.debug = false;
  configuration.sink = console_sink;
}

const timestamp = (): string => new Date().toTimeString().slice(0, 8);

function emit(level: LogLevel, context: string, message: string): void {
  if (!configuration.debug) return;
  configuration.sink(level, `[${timestamp()}] [${level}] [${context}] ${message}`);
}

export const log_output = (context: string, message: string): void =>
  emit("LOG", context, message);

export const warn_output = (context: string, message: string): void =>
  emit("WARN", context, message);

export const error_output = (context: string, message: string): void =>
  emit("ERROR", context, message);
