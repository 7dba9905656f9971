/**
 * Graph configuration
 *
 * Explicit options win over environment variables, which win over defaults.
 *
 * Environment:
 * - `SYMGRAPH_LOG_LEVEL`: initial logger level (see logger.ts)
 * - `SYMGRAPH_SKIP_OBLIGATIONS=1`: do not check recorded equality obligations
 *   during resolution
 */

import { isLogLevel, type LogLevel } from './logger';

/**
 * End bound used for an unbounded slice end when the axis size is unknown
 */
export const DEFAULT_UNBOUNDED_SENTINEL = 2 ** 31 - 1;

export interface GraphOptions {
  /** Diagnostic name used in log output */
  readonly name?: string;
  /** Check recorded equality obligations during resolution (default: true) */
  readonly checkObligations?: boolean;
  /** Level for this graph's log output; the shared Logger level is left as is */
  readonly logLevel?: LogLevel;
}

export interface ResolvedGraphOptions {
  readonly name: string;
  readonly checkObligations: boolean;
  readonly logLevel: LogLevel | undefined;
}

/**
 * Merge explicit options with environment configuration
 */
export function resolveGraphOptions(
  options: GraphOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedGraphOptions {
  const envLevel = env['SYMGRAPH_LOG_LEVEL'];

  return {
    name: options.name ?? 'graph',
    checkObligations: options.checkObligations ?? env['SYMGRAPH_SKIP_OBLIGATIONS'] !== '1',
    logLevel: options.logLevel ?? (isLogLevel(envLevel) ? envLevel : undefined),
  };
}
