export interface CliArgs {
  event?: string;
  code?: string;
  userAgent?: string;
  accept?: string;
  format?: string;
  verify?: boolean;
}

const USAGE =
  "Usage: nostr-unfurl [--event <file>] [--code <code>] [--user-agent <ua>] [--accept <accept>] [--format json|html] [--no-verify]";

const VALUE_FLAGS = {
  "--event": "event",
  "--code": "code",
  "--user-agent": "userAgent",
  "--accept": "accept",
  "--format": "format"
} as const;

function isValueFlag(flag: string): flag is keyof typeof VALUE_FLAGS {
  return flag in VALUE_FLAGS;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === "--no-verify") {
      args.verify = false;
      continue;
    }
    if (!isValueFlag(flag)) {
      throw new Error(`Unknown option ${flag}\n${USAGE}`);
    }

    const value = argv[i + 1];
    if (value === undefined) {
      throw new Error(`Missing value for ${flag}\n${USAGE}`);
    }
    args[VALUE_FLAGS[flag]] = value;
    i++;
  }

  return args;
}
