import log from 'electron-log/node';

const LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

type LevelOption = (typeof LEVELS)[number] | false;

const resolveLevel = (value: string | undefined, fallback: LevelOption): LevelOption => {
  if (!value) {
    return fallback;
  }
  const normalised = value.trim().toLowerCase();
  if (['0', 'false', 'off', 'none'].includes(normalised)) {
    return false;
  }
  return LEVELS.find((level) => level === normalised) ?? fallback;
};

log.transports.console.level = resolveLevel(process.env.CLEAN_FILES_LOG_LEVEL, 'warn');

const logFile = process.env.CLEAN_FILES_LOG_FILE;
if (logFile) {
  log.transports.file.resolvePathFn = () => logFile;
  log.transports.file.level = 'info';
} else {
  log.transports.file.level = false;
}

export const createLogger = (scope: string) => log.scope(scope);

