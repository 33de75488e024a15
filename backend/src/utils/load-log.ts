export type LogLevel = 'info' | 'warn' | 'error';

export type LoadLogEntry = {
  createdAt: string;
  level: LogLevel;
  message: string;
};

type LoadLogOptions = {
  echo?: boolean;
};

/** Log of one load pass; entries are kept for the report and echoed to the console. */
export class LoadLog {
  private readonly entries: LoadLogEntry[] = [];
  private readonly echo: boolean;

  constructor({ echo = true }: LoadLogOptions = {}) {
    this.echo = echo;
  }

  append(level: LogLevel, message: string): void {
    this.entries.push({ createdAt: new Date().toISOString(), level, message });
    if (!this.echo) return;
    const line = `[loader] ${message}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  info(message: string): void {
    this.append('info', message);
  }

  warn(message: string): void {
    this.append('warn', message);
  }

  error(message: string): void {
    this.append('error', message);
  }

  list(): LoadLogEntry[] {
    return [...this.entries];
  }
}
