import * as fs from 'fs';
import * as path from 'path';

// Capture the console methods before anything else can wrap them
const ORIGINAL_CONSOLE = {
  log: console.log,
  error: console.error
};

export interface VerbositySource {
  isVerbose(): boolean;
}

export type LogLevel = 'VERBOSE' | 'INFO' | 'WARN' | 'ERROR';

export class Logger {
  private logDir: string | null;
  private currentLogFile: string | null = null;
  private logStream: fs.WriteStream | null = null;
  private currentLogSize = 0;
  private readonly MAX_LOG_FILES = 5;
  private originalConsole = ORIGINAL_CONSOLE;

  constructor(
    private verbosity: VerbositySource,
    logDir: string | null = null,
    private writeToConsole = true,
    private readonly maxLogSize = 10 * 1024 * 1024 // 10MB
  ) {
    this.logDir = logDir;
    if (this.logDir) {
      this.currentLogFile = this.getCurrentLogFileName(this.logDir);
      this.initializeFileSink();
    }
  }

  private initializeFileSink() {
    if (!this.logDir || !this.currentLogFile) return;
    try {
      fs.mkdirSync(this.logDir, { recursive: true });

      if (fs.existsSync(this.currentLogFile)) {
        this.currentLogSize = fs.statSync(this.currentLogFile).size;
      }

      this.logStream = this.openLogStream(this.currentLogFile);
      this.cleanupOldLogs();
    } catch (error) {
      this.originalConsole.error('[Logger] Failed to initialize file logging:', error);
      this.logStream = null;
    }
  }

  private openLogStream(file: string): fs.WriteStream {
    const stream = fs.createWriteStream(file, { flags: 'a' });
    stream.on('error', (error) => {
      this.originalConsole.error('[Logger] Log file stream failed, file logging disabled:', error);
      if (this.logStream === stream) {
        this.logStream = null;
      }
    });
    return stream;
  }

  private getCurrentLogFileName(logDir: string): string {
    const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
    return path.join(logDir, `orchestrator-${date}.log`);
  }

  private rotateLog() {
    if (!this.logDir || !this.currentLogFile) return;
    try {
      this.logStream?.end();

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      fs.renameSync(this.currentLogFile, path.join(this.logDir, `orchestrator-${timestamp}.log`));

      this.currentLogSize = 0;
      this.logStream = this.openLogStream(this.currentLogFile);
      this.cleanupOldLogs();
    } catch (error) {
      this.originalConsole.error('[Logger] Failed to rotate log:', error);
    }
  }

  private cleanupOldLogs() {
    const logDir = this.logDir;
    if (!logDir) return;
    try {
      const files = fs.readdirSync(logDir)
        .filter(file => file.startsWith('orchestrator-') && file.endsWith('.log'))
        .map(file => ({
          name: file,
          path: path.join(logDir, file),
          mtime: fs.statSync(path.join(logDir, file)).mtime
        }))
        .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

      for (const file of files.slice(this.MAX_LOG_FILES)) {
        try {
          fs.unlinkSync(file.path);
        } catch (error) {
          this.originalConsole.error(`[Logger] Failed to delete old log ${file.name}:`, error);
        }
      }
    } catch (error) {
      this.originalConsole.error('[Logger] Failed to cleanup old logs:', error);
    }
  }

  private writeToFile(line: string) {
    if (!this.logStream || this.logStream.destroyed) return;

    const lineWithNewline = line + '\n';
    const size = Buffer.byteLength(lineWithNewline);
    if (this.currentLogSize + size >= this.maxLogSize) {
      this.rotateLog();
    }

    this.logStream?.write(lineWithNewline);
    this.currentLogSize += size;
  }

  private log(level: LogLevel, message: string, error?: Error) {
    const timestamp = new Date().toISOString();
    const errorInfo = error ? ` Error: ${error.message}\nStack: ${error.stack}` : '';
    const fullMessage = `[${timestamp}] ${level}: ${message}${errorInfo}`;

    if (this.writeToConsole) {
      this.originalConsole.log(fullMessage);
    }
    this.writeToFile(fullMessage);
  }

  verbose(message: string) {
    if (this.verbosity.isVerbose()) {
      this.log('VERBOSE', message);
    }
  }

  info(message: string) {
    this.log('INFO', message);
  }

  warn(message: string, error?: Error) {
    this.log('WARN', message, error);
  }

  error(message: string, error?: Error) {
    this.log('ERROR', message, error);
  }

  /** Flushes and closes the file sink. */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream || stream.destroyed) {
      return Promise.resolve();
    }
    return new Promise(resolve => stream.end(() => resolve()));
  }
}
