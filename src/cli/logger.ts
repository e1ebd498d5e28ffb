import { createLogger } from '../log.js';
import { ui } from './ui.js';

type Data = Record<string, unknown>;

const logger = createLogger('cli');

function info(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'info');
  logger.info({ msg, scope, data });
}
function warn(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'warn');
  logger.warn({ msg, scope, data });
}
function error(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'error');
  logger.error({ msg, scope, data });
}
function debug(msg: string, scope?: string, data?: Data) {
  if (logger.isLevelEnabled('debug')) ui.say(msg, 'dim');
  logger.debug({ msg, scope, data });
}

function withScope(scope: string) {
  return {
    info: (msg: string, data?: Data) => info(msg, scope, data),
    warn: (msg: string, data?: Data) => warn(msg, scope, data),
    error: (msg: string, data?: Data) => error(msg, scope, data),
    debug: (msg: string, data?: Data) => debug(msg, scope, data),
  };
}

export const log = { info, warn, error, debug, withScope };
export default log;
