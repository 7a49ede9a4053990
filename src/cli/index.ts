/**
 * CLI Module
 *
 * Help and usage rendering
 */

export type { HelpSink } from './help';
export { formatUsage, formatEntry, formatHelp, printHelp } from './help';
