import { getLogger, type Logger } from '@logtape/logtape';

/** Root LogTape category of every logger in this package. */
export const LOG_CATEGORY = 'stepcodec';

/**
 * Logger for one area of the library, e.g. `getCodecLogger('length')`.
 * Nothing is emitted unless the application configures LogTape sinks.
 */
export function getCodecLogger(...subcategory: string[]): Logger {
  return getLogger([LOG_CATEGORY, ...subcategory]);
}
