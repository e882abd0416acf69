import pino from 'pino';
import pretty from 'pino-pretty';
import { AsyncLocalStorage } from 'async_hooks';
import chalk from 'chalk';

// --- Async Context for Request Correlation ---
export const logContext = new AsyncLocalStorage<{ requestId: string }>();

// --- Color Helper ---
const moduleColors: Record<string, chalk.Chalk> = {
  'System': chalk.magenta.bold,
  'Web': chalk.blue.bold,
  'Knowledge': chalk.cyan.bold,
  'Embedding': chalk.hex('#8A2BE2').bold, // BlueViolet
  'Tools': chalk.hex('#FFA500').bold,     // Orange
  'Sessions': chalk.green.bold,
  'Config': chalk.yellow.bold,
};

const getColor = (moduleName: string) => {
  // Sub-modules (e.g. Tools:search_web) share the parent colour
  const baseModule = moduleName.split(':')[0];
  if (moduleColors[baseModule]) return moduleColors[baseModule];

  // Hash to pick a consistent color
  const colors = [chalk.red, chalk.green, chalk.yellow, chalk.blue, chalk.magenta, chalk.cyan];
  let hash = 0;
  for (let i = 0; i < moduleName.length; i++) {
    hash = moduleName.charCodeAt(i) + ((hash << 5) - hash);
  }
  return colors[Math.abs(hash) % colors.length].bold;
};

const prettyStream = pretty({
  colorize: true,
  translateTime: 'SYS:standard',
  ignore: 'pid,hostname,module,requestId',
  messageFormat: (log, messageKey) => {
    const msg = String(log[messageKey] ?? '');
    const moduleName = typeof log.module === 'string' ? log.module : undefined;
    const requestId = typeof log.requestId === 'string' ? chalk.gray(` (${log.requestId.slice(0, 8)})`) : '';

    if (moduleName) {
      const color = getColor(moduleName);
      return `${color(`[${moduleName}]`)} ${msg}${requestId}`;
    }

    return `${msg}${requestId}`;
  },
});

const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

const logger = pino(
  {
    level: process.env.LOG_LEVEL || defaultLevel,
    base: { pid: false },
    mixin() {
      const store = logContext.getStore();
      return store ? { requestId: store.requestId } : {};
    },
  },
  prettyStream
);

export default logger;
