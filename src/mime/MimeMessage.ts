import { LINE_SEPARATOR } from "../shared/SmtpConstants";

// Fixed so that build() is reproducible. A body line equal to the delimiter breaks the structure.
export const MIME_BOUNDARY: string = "mail-boundary";

export interface MimeAttachment {
  readonly filename: string;
  readonly data: Buffer;
}

/**
 * A multipart/mixed message (RFC 2045): one text part plus base64 attachments.
 * Addresses are not validated here, SmtpClientCommander.send() does that.
 */
export class MimeMessage {
  protected _attachments: MimeAttachment[] = [];

  public constructor(
    public readonly to: string[],
    public readonly from: string,
    public readonly subject: string,
    public readonly body: string
  ) {}

  public get attachments(): readonly MimeAttachment[] {
    return this._attachments;
  }

  /**
   * Attaches binary data as a file with the given name.
   * @param filename the file name, used as-is.
   * @param data the data.
   */
  public attach(filename: string, data: Buffer | Uint8Array): void {
    this._attachments.push({ filename, data: Buffer.from(data) });
  }

  /**
   * Builds the message, ready for sending.
   */
  public build(): Buffer {
    const crlf: string = LINE_SEPARATOR;
    const parts: string[] = [];

    parts.push(`From: ${this.from}${crlf}`);
    parts.push(`To: ${this.to.join(";")}${crlf}`);
    parts.push(`Subject: ${this.subject}${crlf}`);

    parts.push(`MIME-Version: 1.0${crlf}`);
    parts.push(`Content-Type: multipart/mixed; boundary=${MIME_BOUNDARY}${crlf}`);
    parts.push(`${crlf}--${MIME_BOUNDARY}${crlf}`);
    parts.push(`Content-Type: text/plain; charset="utf-8"${crlf}`);
    parts.push(crlf + this.body);

    // Attachments are declared text/plain whatever they hold.
    for (const attachment of this._attachments) {
      parts.push(`${crlf}${crlf}--${MIME_BOUNDARY}${crlf}`);
      parts.push(`Content-Type: text/plain; charset="utf-8"${crlf}`);
      parts.push(`Content-Transfer-Encoding: base64${crlf}`);
      parts.push(`Content-Disposition: attachment; filename=${attachment.filename}${crlf}`);
      parts.push(`Content-ID: <${attachment.filename}>${crlf}${crlf}`);
      parts.push(attachment.data.toString("base64"));
    }

    parts.push(`${crlf}${crlf}--${MIME_BOUNDARY}--`);

    return Buffer.from(parts.join(""), "utf-8");
  }
}
