import { RecordHeader } from './LogRecord';

export const RECORD_HEADER_SIZE = 8;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export class RecordCodec {

  public static encode(key: Buffer, value: Buffer): Buffer {
    const buffer = Buffer.allocUnsafe(RECORD_HEADER_SIZE + key.length + value.length);

    let offset = 0;
    buffer.writeUInt32BE(key.length, offset);
    offset += 4;

    buffer.writeUInt32BE(value.length, offset);
    offset += 4;

    key.copy(buffer, offset);
    offset += key.length;

    value.copy(buffer, offset);

    return buffer;
  }

  /**
   * Reads the two length prefixes. The caller guarantees at least
   * RECORD_HEADER_SIZE bytes.
   */
  public static decodeHeader(buffer: Buffer): RecordHeader {
    return {
      keyLength: buffer.readUInt32BE(0),
      valueLength: buffer.readUInt32BE(4),
    };
  }

  public static recordSize(header: RecordHeader): number {
    return RECORD_HEADER_SIZE + header.keyLength + header.valueLength;
  }

  /** Strict UTF-8 decode; null when the bytes are not well-formed. */
  public static decodeText(bytes: Uint8Array): string | null {
    try {
      return strictUtf8.decode(bytes);
    } catch {
      return null;
    }
  }

  /**
   * Encodes text as UTF-8, or returns null when the string holds lone
   * surrogates that UTF-8 cannot represent.
   */
  public static encodeText(text: string): Buffer | null {
    const bytes = Buffer.from(text, 'utf8');
    return bytes.toString('utf8') === text ? bytes : null;
  }
}
