export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFields = Record<string, unknown>;

export interface LoggerOptions {
  name: string;
  level: LogLevel;
  json: boolean;
  pretty: boolean;
  // куда писать строки; по умолчанию console.log
  write?: (line: string) => void;
  // поля, добавляемые к каждой записи
  bindings?: LogFields;
}

export interface Logger {
  debug(msg: string, extra?: LogFields): void;
  info(msg: string, extra?: LogFields): void;
  warn(msg: string, extra?: LogFields): void;
  error(msg: string, extra?: LogFields): void;
  child(bindings: LogFields): Logger;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function format(opt: LoggerOptions, lvl: LogLevel, msg: string, fields?: LogFields): string {
  const ts = new Date().toISOString();
  if (opt.json) {
    const rec = { level: lvl, ts, name: opt.name, msg, ...fields };
    return opt.pretty ? JSON.stringify(rec, null, 2) : JSON.stringify(rec);
  }
  const rest = fields ? " " + JSON.stringify(fields) : "";
  return `[${ts}] ${opt.name} ${lvl.toUpperCase()}: ${msg}${rest}`;
}

export function createLogger(opt: LoggerOptions): Logger {
  const threshold = levelOrder[opt.level];
  const write = opt.write ?? ((line: string) => console.log(line));

  function out(lvl: LogLevel, msg: string, extra?: LogFields) {
    if (levelOrder[lvl] < threshold) return;
    const fields = opt.bindings || extra ? { ...opt.bindings, ...extra } : undefined;
    write(format(opt, lvl, msg, fields));
  }

  return {
    debug: (m, e) => out("debug", m, e),
    info: (m, e) => out("info", m, e),
    warn: (m, e) => out("warn", m, e),
    error: (m, e) => out("error", m, e),
    child: (bindings) =>
      createLogger({ ...opt, bindings: { ...opt.bindings, ...bindings } }),
  };
}
