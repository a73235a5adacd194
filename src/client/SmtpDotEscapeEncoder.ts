const DOT: number = 0x2e;
const CR: number = 0x0d;
const LF: number = 0x0a;
const ESCAPED_DOT: Buffer = Buffer.from([DOT]);
const BARE_LF_PREFIX: Buffer = Buffer.from([CR]);

enum SmtpDotEscapeState {
  BeginLine,
  Data,
  CR,
}

/**
 * Encodes a DATA payload: leading dots are doubled, bare LF becomes CRLF,
 * and `finish()` terminates the last line and writes the end-of-data marker.
 * The state carries over between chunks.
 */
export class SmtpDotEscapeEncoder {
  protected _state: SmtpDotEscapeState = SmtpDotEscapeState.BeginLine;

  /**
   * Encodes the given chunk, unchanged runs are copied as slices.
   * @param chunk the chunk.
   */
  public encode(chunk: Buffer): Buffer {
    const pieces: Buffer[] = [];
    let start: number = 0;

    for (let i: number = 0; i < chunk.length; ++i) {
      const byte: number = chunk[i];

      if (this._state === SmtpDotEscapeState.CR) {
        this._state =
          byte === LF ? SmtpDotEscapeState.BeginLine : SmtpDotEscapeState.Data;
        continue;
      }

      if (this._state === SmtpDotEscapeState.BeginLine && byte === DOT) {
        pieces.push(chunk.subarray(start, i), ESCAPED_DOT);
        start = i;
      }

      if (byte === CR) {
        this._state = SmtpDotEscapeState.CR;
      } else if (byte === LF) {
        pieces.push(chunk.subarray(start, i), BARE_LF_PREFIX);
        start = i;
        this._state = SmtpDotEscapeState.BeginLine;
      } else {
        this._state = SmtpDotEscapeState.Data;
      }
    }

    if (pieces.length === 0) {
      return chunk;
    }

    pieces.push(chunk.subarray(start));
    return Buffer.concat(pieces);
  }

  /**
   * Gets the bytes that end the payload.
   */
  public finish(): Buffer {
    let tail: string;
    switch (this._state) {
      case SmtpDotEscapeState.CR:
        tail = "\n.\r\n";
        break;
      case SmtpDotEscapeState.Data:
        tail = "\r\n.\r\n";
        break;
      default:
        tail = ".\r\n";
        break;
    }

    this._state = SmtpDotEscapeState.BeginLine;
    return Buffer.from(tail, "ascii");
  }
}
