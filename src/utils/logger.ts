export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogThreshold = LogLevel | 'silent';

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// Read on every call so LOG_LEVEL from .env applies once config has loaded it
function currentThreshold(): LogThreshold {
  const raw = String(process.env.LOG_LEVEL || '').trim().toLowerCase();
  return isThreshold(raw) ? raw : 'info';
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentThreshold()];
}

function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').split('.')[0];
}

function log(level: LogLevel, message: string, data?: unknown): void {
  if (!isLevelEnabled(level)) return;

  const levelColors: Record<LogLevel, string> = {
    debug: COLORS.dim,
    info: COLORS.green,
    warn: COLORS.yellow,
    error: COLORS.red,
  };

  const prefix = `${COLORS.dim}[${timestamp()}]${COLORS.reset} ${levelColors[level]}[${level.toUpperCase()}]${COLORS.reset}`;

  console.log(`${prefix} ${message}`);
  if (data !== undefined) {
    const body = data instanceof Error ? { name: data.name, message: data.message } : data;
    console.log(COLORS.dim + JSON.stringify(body, null, 2) + COLORS.reset);
  }
}

export const logger = {
  debug: (msg: string, data?: unknown) => log('debug', msg, data),
  info: (msg: string, data?: unknown) => log('info', msg, data),
  warn: (msg: string, data?: unknown) => log('warn', msg, data),
  error: (msg: string, data?: unknown) => log('error', msg, data),

  step: (step: number, total: number, msg: string) => {
    if (!isLevelEnabled('info')) return;
    console.log(`\n${COLORS.magenta}━━━ Step ${step}/${total}: ${msg} ━━━${COLORS.reset}`);
  },

  success: (msg: string) => {
    if (!isLevelEnabled('info')) return;
    console.log(`${COLORS.green}✅ ${msg}${COLORS.reset}`);
  },

  banner: (title: string, lines: string[]) => {
    if (!isLevelEnabled('info')) return;
    const width = 60;
    const pad = (text: string) => text.slice(0, width - 2).padEnd(width - 2);
    console.log(`${COLORS.cyan}╔${'═'.repeat(width)}╗`);
    console.log(`║ ${pad(title)} ║`);
    console.log(`╠${'═'.repeat(width)}╣`);
    for (const line of lines) {
      console.log(`║ ${pad(line)} ║`);
    }
    console.log(`╚${'═'.repeat(width)}╝${COLORS.reset}`);
  },
};
