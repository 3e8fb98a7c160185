import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';

/**
 * Platform default for log files. DESKPILOT_LOG_DIR wins when set.
 */
export function resolveLogDirectory(
  platform: NodeJS.Platform = os.platform(),
): string {
  const override = process.env.DESKPILOT_LOG_DIR;
  if (override && override.trim().length > 0) {
    return override.trim();
  }

  switch (platform) {
    case 'win32':
      return path.join(
        process.env.LOCALAPPDATA ?? os.homedir(),
        'Deskpilot',
        'logs',
      );
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Logs', 'Deskpilot');
    default:
      return path.join(os.homedir(), '.local', 'state', 'deskpilot', 'logs');
  }
}

/**
 * Create Winston logger configuration with platform-aware paths
 */
export function createWinstonLogger(): winston.Logger {
  let logDir = resolveLogDirectory();

  if (!fs.existsSync(logDir)) {
    try {
      fs.mkdirSync(logDir, { recursive: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`Failed to create log directory ${logDir}: ${reason}`);
      logDir = os.tmpdir();
    }
  }

  const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, context, stack }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      const stackStr = stack ? `\n${String(stack)}` : '';
      return `[${String(timestamp)}] [${level.toUpperCase()}] ${contextStr}${String(message)}${stackStr}`;
    }),
  );

  // Colorized for terminals
  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, context }) => {
      const contextStr = context ? `[${String(context)}] ` : '';
      return `[${String(timestamp)}] ${level} ${contextStr}${String(message)}`;
    }),
  );

  const level = process.env.DESKPILOT_LOG_LEVEL ?? 'debug';

  const fileRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'deskpilot-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level,
  });

  const errorRotateTransport = new DailyRotateFile({
    filename: path.join(logDir, 'deskpilot-error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    zippedArchive: true,
    maxSize: '10m',
    maxFiles: '14d',
    format: logFormat,
    level: 'error',
  });

  const consoleTransport = new winston.transports.Console({
    format: consoleFormat,
    level,
  });

  return winston.createLogger({
    level,
    transports: [consoleTransport, fileRotateTransport, errorRotateTransport],
    exceptionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, 'deskpilot-exceptions.log'),
        format: logFormat,
      }),
    ],
    rejectionHandlers: [
      new winston.transports.File({
        filename: path.join(logDir, 'deskpilot-rejections.log'),
        format: logFormat,
      }),
    ],
  });
}
