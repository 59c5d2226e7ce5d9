/**
 * CLI Entry Point - Command line argument handling
 */
import type { RuntimeFlags } from '../core/config/runtime-config.js';

export type CliCommand =
  | { kind: 'run'; flags: RuntimeFlags }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'invalid'; message: string };

export const USAGE = `tether - bridge a chat to coding-agent subprocesses

Usage:
  tether [options]

Options:
  -c, --config PATH    Extra config file, merged over ~/.tether and ./.tether
  -d, --debug          Log at debug level
  -h, --help           Show this help
  -v, --version        Show version

Signals:
  SIGHUP               Reload configuration
  SIGINT, SIGTERM      Cancel running agents and exit
`;

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const flags: RuntimeFlags = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') return { kind: 'help' };
    if (arg === '--version' || arg === '-v') return { kind: 'version' };
    if (arg === '--debug' || arg === '-d') {
      flags.debug = true;
      continue;
    }
    if (arg === '--config' || arg === '-c') {
      const value = argv[i + 1];
      if (!value || value.startsWith('-')) {
        return { kind: 'invalid', message: `${arg} requires a path` };
      }
      flags.configPath = value;
      i++;
      continue;
    }
    if (arg.startsWith('--config=')) {
      flags.configPath = arg.slice('--config='.length);
      continue;
    }
    return { kind: 'invalid', message: `unknown argument: ${arg}` };
  }
  return { kind: 'run', flags };
}
