import { type Log, type UriLogWritable } from '../internal';

/** Keeps every log record it is given, in order. */
export class LogCollector implements UriLogWritable {
  logs: Log[] = [];

  write(log: Log): void {
    this.logs.push(log);
  }

  messages(): Array<string | undefined> {
    return this.logs.map(log => log.message);
  }
}
