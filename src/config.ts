import { DEFAULT_AWS_REGION, SERVER_NAME, SERVER_VERSION } from './constants';
import type { ServerConfig } from './types';
import { ConfigurationError } from './utils/errors';

interface CliOptions {
  profile?: string;
  region?: string;
  skipValidation?: boolean;
  help?: boolean;
}

export const USAGE = [
  'Usage: aws-cost-explorer-mcp [options]',
  '',
  'Serves AWS Cost Explorer tools over MCP on stdio.',
  '',
  'Options:',
  '  --profile <name>    AWS profile name (overrides AWS_PROFILE)',
  '  --region <region>   Region for identity checks (overrides AWS_DEFAULT_REGION)',
  '  --skip-validation   Skip the startup credential and permission check',
  '  -h, --help          Show this help'
].join('\n');

/**
 * Parses command line flags
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {};

  const valueFor = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`${flag} requires a value`, { flag });
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--profile':
        options.profile = valueFor(arg, ++i);
        break;
      case '--region':
        options.region = valueFor(arg, ++i);
        break;
      case '--skip-validation':
        options.skipValidation = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`, { option: arg });
    }
  }

  return options;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Loads configuration from flags, then environment variables, then defaults
 */
export function loadConfiguration(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const options = parseArgs(argv);

  return {
    serverName: SERVER_NAME,
    serverVersion: SERVER_VERSION,
    profile: nonEmpty(options.profile) ?? nonEmpty(env.AWS_PROFILE),
    region: nonEmpty(options.region) ?? nonEmpty(env.AWS_DEFAULT_REGION) ?? DEFAULT_AWS_REGION,
    skipStartupValidation: options.skipValidation === true || env.SKIP_STARTUP_VALIDATION === 'true',
    showHelp: options.help === true
  };
}
