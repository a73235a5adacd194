import { LINE_SEPARATOR, SEGMENT_SEPARATOR } from "./SmtpConstants";

export enum SmtpCommandType {
  Helo = "HELO",
  Ehlo = "EHLO",
  Mail = "MAIL",
  Rcpt = "RCPT",
  Data = "DATA",
  Noop = "NOOP",
  Quit = "QUIT",
  Auth = "AUTH",
  StartTLS = "STARTTLS",
}

export class SmtpCommand {
  /**
   * Constructs a new command.
   * @param type the command verb, or null for a bare continuation line (SASL responses).
   * @param args the arguments.
   * @param sensitive if the arguments must not show up in logs.
   */
  public constructor(
    public readonly type: SmtpCommandType | null,
    public readonly args: string | string[] | null = null,
    public readonly sensitive: boolean = false
  ) {}

  /**
   * Gets the arguments array.
   */
  public get arguments(): string[] {
    if (this.args === null) {
      return [];
    }

    return typeof this.args === "string" ? [this.args] : this.args;
  }

  /**
   * Encodes the command.
   * @param add_newline if the line separator should be added.
   */
  public encode(add_newline: boolean = false): string {
    const arr: string[] = [];

    if (this.type !== null) {
      arr.push(this.type);
    }

    this.arguments.forEach((arg: string): void => {
      arr.push(arg.trim());
    });

    let result: string = arr.join(SEGMENT_SEPARATOR);
    if (add_newline) {
      result += LINE_SEPARATOR;
    }

    return result;
  }

  /**
   * Encodes the command for logging, with sensitive arguments masked.
   */
  public encode_safe(): string {
    if (!this.sensitive) {
      return this.encode(false);
    }

    return this.type === null ? "***" : `${this.type} ***`;
  }
}
