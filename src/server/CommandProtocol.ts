import { GetResult } from '../common/Types';

export enum CommandVerb {
  SET = 'SET',
  GET = 'GET',
  EXIT = 'EXIT',
}

export interface SetCommand {
  readonly verb: CommandVerb.SET;
  readonly key: string;
  readonly value: string;
}

export interface GetCommand {
  readonly verb: CommandVerb.GET;
  readonly key: string;
}

export interface ExitCommand {
  readonly verb: CommandVerb.EXIT;
}

export type Command = SetCommand | GetCommand | ExitCommand;

export type ParsedLine =
  | { readonly type: 'empty' }
  | { readonly type: 'command'; readonly command: Command }
  | { readonly type: 'invalid'; readonly message: string };

export const OK_REPLY = 'OK';
export const NIL_REPLY = '(nil)';

const FIRST_TOKEN = /^(\S+)\s*([\s\S]*)$/;

export class CommandParser {

  /**
   * Parses one input line. Only the verb is case-insensitive; the value of a
   * SET is everything after the key, inner whitespace included.
   */
  public static parse(line: string): ParsedLine {
    const trimmed = line.trim();
    if (trimmed === '') {
      return { type: 'empty' };
    }

    const [verbToken, afterVerb] = this.splitToken(trimmed);
    const verb = verbToken.toUpperCase();

    switch (verb) {
      case CommandVerb.EXIT:
        return { type: 'command', command: { verb: CommandVerb.EXIT } };

      case CommandVerb.SET: {
        const [key, value] = this.splitToken(afterVerb);
        if (key === '' || value === '') {
          return { type: 'invalid', message: 'SET requires key and value' };
        }
        return { type: 'command', command: { verb: CommandVerb.SET, key, value } };
      }

      case CommandVerb.GET: {
        const [key] = this.splitToken(afterVerb);
        if (key === '') {
          return { type: 'invalid', message: 'GET requires key' };
        }
        return { type: 'command', command: { verb: CommandVerb.GET, key } };
      }

      default:
        return { type: 'invalid', message: `Unknown command '${verb}'` };
    }
  }

  private static splitToken(text: string): [string, string] {
    const match = FIRST_TOKEN.exec(text);
    if (match === null) {
      return ['', ''];
    }
    return [match[1] ?? '', match[2] ?? ''];
  }
}

export class ReplyFormatter {

  public static ok(): string {
    return OK_REPLY;
  }

  public static getResult(result: GetResult): string {
    switch (result.kind) {
      case 'found':
        return result.value;
      case 'not_found':
        return NIL_REPLY;
      case 'error':
        return this.error(result.error.message);
    }
  }

  public static error(message: string): string {
    return `Error: ${message}`;
  }
}
