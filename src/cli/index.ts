/**
 * CLI Module
 *
 * Help output for argument registries
 */

export { formatHelp, getHelpText, printHelp } from './help';
