import createDebug from 'debug';

const ROOT = 'listdiff';

export type Logger = createDebug.Debugger;

export function createLogger(scope: string): Logger {
  return createDebug(`${ROOT}:${scope}`);
}
