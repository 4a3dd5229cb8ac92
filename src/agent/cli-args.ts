export interface CliArgs {
  url?: string;
  query?: string;
  provider?: string;
  model?: string;
  quiet?: boolean;
  help?: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--url":
      case "-u":
        result.url = args[++i];
        break;
      case "--query":
      case "-q":
        result.query = args[++i];
        break;
      case "--provider":
      case "-p":
        result.provider = args[++i];
        break;
      case "--model":
      case "-m":
        result.model = args[++i];
        break;
      case "--quiet":
        result.quiet = true;
        break;
      case "--help":
      case "-h":
        result.help = true;
        break;
      default:
        // A bare URL is accepted as the first positional argument
        if (!result.url && !args[i].startsWith("-")) {
          result.url = args[i];
        }
    }
  }

  return result;
}
