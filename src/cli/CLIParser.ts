import { StoreConfig, TailRecoveryPolicy, DEFAULT_CONFIG, resolveConfig } from '../common/Config';
import { LogLevel, parseLogLevel } from '../common/Logger';

export interface CLIOptions {
  readonly config: StoreConfig;
  readonly logLevel: LogLevel;
  readonly help: boolean;
}

export class CLIParser {
  private readonly args: string[];
  private readonly env: NodeJS.ProcessEnv;

  constructor(args: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env) {
    this.args = args;
    this.env = env;
  }

  public parse(): CLIOptions {
    const logLevel = this.parseLogLevel();

    if (this.hasFlag('--help') || this.hasFlag('-h')) {
      return { config: DEFAULT_CONFIG, logLevel, help: true };
    }

    const config = resolveConfig({
      dataFile: this.getString('--data-file') ?? DEFAULT_CONFIG.dataFile,
      maxKeyBytes: this.getNumber('--max-key-bytes') ?? DEFAULT_CONFIG.maxKeyBytes,
      maxValueBytes: this.getNumber('--max-value-bytes') ?? DEFAULT_CONFIG.maxValueBytes,
      tailRecovery: this.parseTailRecovery() ?? DEFAULT_CONFIG.tailRecovery,
    });

    return { config, logLevel, help: false };
  }

  private parseTailRecovery(): TailRecoveryPolicy | undefined {
    const value = this.getString('--tail-recovery');
    if (!value) return undefined;

    const normalized = value.toLowerCase();
    switch (normalized) {
      case 'truncate': return TailRecoveryPolicy.TRUNCATE;
      case 'keep': return TailRecoveryPolicy.KEEP;
      default: throw new Error(`Invalid tail recovery policy: ${value}. Must be truncate or keep`);
    }
  }

  private parseLogLevel(): LogLevel {
    const flag = this.getString('--log-level');
    if (flag) {
      const level = parseLogLevel(flag);
      if (!level) {
        throw new Error(`Invalid log level: ${flag}. Must be debug, info, warn, error, or silent`);
      }
      return level;
    }

    return parseLogLevel(this.env['LOG_LEVEL']) ?? 'info';
  }

  private getString(flag: string): string | undefined {
    const prefix = `${flag}=`;
    const inline = this.args.find(arg => arg.startsWith(prefix));
    if (inline !== undefined) {
      return inline.slice(prefix.length);
    }

    const flagIndex = this.args.indexOf(flag);
    if (flagIndex !== -1 && flagIndex + 1 < this.args.length) {
      return this.args[flagIndex + 1];
    }

    return undefined;
  }

  private getNumber(flag: string): number | undefined {
    const str = this.getString(flag);
    if (!str) return undefined;

    if (!/^\d+$/.test(str)) {
      throw new Error(`Invalid number for ${flag}: ${str}`);
    }
    return parseInt(str, 10);
  }

  private hasFlag(flag: string): boolean {
    return this.args.includes(flag);
  }

  public static printHelp(): void {
    console.log(`
appendlog-kv - persistent key-value store on an append-only log

Usage: node dist/index.js [options]

Commands are read from stdin, one per line:
  SET <key> <value>       Store value (may contain spaces); replies OK
  GET <key>               Print the value, or (nil) when absent
  EXIT                    Quit

Options:
  --help, -h              Show this help message

Storage Options:
  --data-file=PATH        Log file (default: data.db)
  --max-key-bytes=N       Largest accepted key (default: 65536)
  --max-value-bytes=N     Largest accepted value (default: 1048576)
  --tail-recovery=MODE    On a torn tail at startup: truncate, keep (default: truncate)

Logging Options:
  --log-level=LEVEL       debug, info, warn, error, silent (default: $LOG_LEVEL or info)
                          Logs go to stderr as JSON lines.

Examples:
  # Default data file in the current directory
  node dist/index.js

  # Separate store, quiet logs
  node dist/index.js --data-file=/var/lib/kv/users.db --log-level=warn
`);
  }
}
