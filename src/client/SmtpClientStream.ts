import {Writable, WritableOptions} from "stream";
import {LINE_SEPARATOR} from "../shared/SmtpConstants";
import {SmtpResponse} from "../shared/SmtpResponse";
import {SmtpDataBuffer} from "../shared/SmtpDataBuffer";

export class SmtpClientStream extends Writable {
  protected _buffer: SmtpDataBuffer;
  protected _responseDecodeState: Generator<void, SmtpResponse, string> | null;

  /**
   * Constructs a new SMTP client stream.
   * @param options the options.
   */
  public constructor(options?: WritableOptions) {
    super(options);

    this._buffer = new SmtpDataBuffer();
    this._responseDecodeState = null;
  }

  /**
   * If received data has not yet formed a complete response.
   */
  public get buffered(): boolean {
    return this._buffer.size > 0 || this._responseDecodeState !== null;
  }

  /**
   * Handles a new chunk of data.
   * @param chunk the chunk of data.
   * @param encoding the encoding.
   * @param next goes to the next chunk.
   */
  public _write(
    chunk: Buffer,
    encoding: BufferEncoding,
    next: (error?: Error | null) => void
  ): void {
    if (!chunk || chunk.length === 0) {
      next();
      return;
    }

    this._buffer.write(chunk);

    try {
      this._handleResponseWrite();
    } catch (e) {
      this._responseDecodeState = null;
      next(e instanceof Error ? e : new Error(String(e)));
      return;
    }

    next();
  }

  /**
   * Feeds every complete line to the response decoder.
   */
  protected _handleResponseWrite(): void {
    let segment: string | null;
    while ((segment = this._buffer.segment(LINE_SEPARATOR)) !== null) {
      if (!this._responseDecodeState) {
        this._responseDecodeState = SmtpResponse.fancy_decode();
        this._responseDecodeState.next();
      }

      const result: IteratorResult<void, SmtpResponse> =
        this._responseDecodeState.next(segment);
      if (!result.done) {
        continue;
      }

      this._responseDecodeState = null;
      this.emit("response", result.value);
    }
  }
}
