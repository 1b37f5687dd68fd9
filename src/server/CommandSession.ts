import * as readline from 'readline';
import { Readable, Writable } from 'stream';
import { Logger, logger as defaultLogger } from '../common/Logger';
import { IStorageEngine } from '../interfaces/Storage';
import { Command, CommandParser, CommandVerb, ReplyFormatter } from './CommandProtocol';

export interface CommandSessionConfig {
  readonly input: Readable;
  readonly output: Writable;
  readonly logger?: Logger | undefined;
}

export type SessionEndReason = 'exit' | 'eof' | 'stopped';

export interface LineOutcome {
  readonly reply: string | null;
  readonly exit: boolean;
}

/**
 * Read-eval-print loop: one command per input line, one reply line per
 * command. Lines are handled strictly one after another.
 */
export class CommandSession {
  private readonly store: IStorageEngine;
  private readonly config: CommandSessionConfig;
  private readonly logger: Logger;
  private lines: readline.Interface | null = null;
  private stopped = false;

  constructor(store: IStorageEngine, config: CommandSessionConfig) {
    this.store = store;
    this.config = config;
    this.logger = config.logger ?? defaultLogger;
  }

  public async run(): Promise<SessionEndReason> {
    if (this.lines !== null) {
      throw new Error('CommandSession: Already running');
    }

    const lines = readline.createInterface({
      input: this.config.input,
      crlfDelay: Infinity,
      terminal: false,
    });
    this.lines = lines;

    try {
      for await (const line of lines) {
        const outcome = await this.handleLine(line);
        if (outcome.reply !== null) {
          this.config.output.write(`${outcome.reply}\n`);
        }
        if (outcome.exit) {
          return 'exit';
        }
      }
      return this.stopped ? 'stopped' : 'eof';
    } finally {
      lines.close();
      this.lines = null;
    }
  }

  /** Ends a running session after the line in progress. */
  public stop(): void {
    this.stopped = true;
    this.lines?.close();
  }

  public async handleLine(line: string): Promise<LineOutcome> {
    const parsed = CommandParser.parse(line);

    switch (parsed.type) {
      case 'empty':
        return { reply: null, exit: false };
      case 'invalid':
        return { reply: ReplyFormatter.error(parsed.message), exit: false };
      case 'command':
        return this.execute(parsed.command);
    }
  }

  private async execute(command: Command): Promise<LineOutcome> {
    try {
      switch (command.verb) {
        case CommandVerb.EXIT:
          return { reply: null, exit: true };

        case CommandVerb.SET:
          await this.store.set(command.key, command.value);
          return { reply: ReplyFormatter.ok(), exit: false };

        case CommandVerb.GET: {
          const result = await this.store.get(command.key);
          return { reply: ReplyFormatter.getResult(result), exit: false };
        }
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn('session.command_failed', { verb: command.verb, err_message: message });
      return { reply: ReplyFormatter.error(message), exit: false };
    }
  }
}
