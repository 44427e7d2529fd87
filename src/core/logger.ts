import pino, { type Logger } from "pino";

export function createLogger(level: string): Logger {
  // stdout carries the tool protocol, so logs go to stderr.
  return pino({ level, name: "memory-bank" }, pino.destination(2));
}
