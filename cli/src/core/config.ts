/**
 * Runtime configuration. Command flags override these; these override defaults.
 *
 *   FOLIO_LOG_LEVEL       debug | info | warn | error | silent (default: info)
 *   FOLIO_NAMING_PATTERN  default split naming pattern, must contain [N]
 *   FOLIO_ASSUME_YES      1 / true: overwrite existing outputs without asking
 */

import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';
import { hasPlaceholder } from './pdf/naming.js';

export interface FolioConfig {
  logLevel: LogLevel;
  namingPattern?: string;
  assumeYes: boolean;
}

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): FolioConfig {
  const rawLevel = env.FOLIO_LOG_LEVEL?.trim().toLowerCase() ?? '';
  const logLevel = isLogLevel(rawLevel) ? rawLevel : DEFAULT_LOG_LEVEL;

  const rawPattern = env.FOLIO_NAMING_PATTERN?.trim();
  const namingPattern = rawPattern && hasPlaceholder(rawPattern) ? rawPattern : undefined;

  const rawYes = env.FOLIO_ASSUME_YES?.trim().toLowerCase();
  const assumeYes = rawYes === '1' || rawYes === 'true';

  return {
    logLevel,
    ...(namingPattern && { namingPattern }),
    assumeYes,
  };
}
