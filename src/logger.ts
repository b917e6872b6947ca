// Цвета для консоли
export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

// stdout занят протоколом MCP, поэтому всё пишется в stderr
export function log(message: string, color: string = colors.reset) {
  const timestamp = new Date().toLocaleString('ru-RU');
  console.error(`${colors.cyan}[${timestamp}]${colors.reset} ${color}${message}${colors.reset}`);
}

export function logError(message: string, error?: unknown) {
  const details = error instanceof Error ? `: ${error.message}` : '';
  log(`${message}${details}`, colors.red);
}

export function logHeader(message: string) {
  console.error('\n' + '═'.repeat(60));
  console.error(`${colors.bright}${colors.magenta}${message}${colors.reset}`);
  console.error('═'.repeat(60) + '\n');
}
