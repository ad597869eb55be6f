import { parseArgs } from 'node:util';

export interface CliOptions {
  debug: boolean;
  listTools: boolean;
  http: boolean;
}

export const USAGE = 'Usage: paper-research-mcp [--debug] [--list-tools] [--http]';

/**
 * Parse command line flags; unknown flags throw a TypeError from node:util
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      'debug': { type: 'boolean', default: false },
      'list-tools': { type: 'boolean', default: false },
      'http': { type: 'boolean', default: false }
    },
    strict: true,
    allowPositionals: false
  });

  return {
    debug: values.debug === true,
    listTools: values['list-tools'] === true,
    http: values.http === true
  };
}
