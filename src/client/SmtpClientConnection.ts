import tls from "tls";
import winston from "winston";
import {SmtpAuthMechanism} from "./SmtpClientAuth";
import {SmtpClientExtension} from "./SmtpClientServerConfig";

export interface SmtpClientDataWriter {
  write(chunk: Buffer | string): Promise<void>;

  /**
   * Ends the payload and waits for the server to accept it.
   */
  close(): Promise<void>;
}

/**
 * The command set the commander sequences over. SmtpClient is the socket
 * implementation; tests substitute their own.
 */
export interface SmtpClientConnection {
  readonly secure: boolean;

  /**
   * Reads the greeting (once) and sends EHLO, or HELO if EHLO is refused.
   */
  hello(local_name: string, signal?: AbortSignal): Promise<void>;

  extension(name: string): SmtpClientExtension;

  startTLS(options: tls.ConnectionOptions, signal?: AbortSignal): Promise<void>;

  auth(mechanism: SmtpAuthMechanism, signal?: AbortSignal): Promise<void>;

  mail(from: string): Promise<void>;

  rcpt(to: string): Promise<void>;

  data(): Promise<SmtpClientDataWriter>;

  noop(signal?: AbortSignal): Promise<void>;

  quit(): Promise<void>;

  close(): void;
}

export interface SmtpClientDialOptions {
  host: string;
  port: number;
  timeout: number;
  signal?: AbortSignal;
  logger?: winston.Logger;
}

export type SmtpClientDialer = (
  options: SmtpClientDialOptions
) => Promise<SmtpClientConnection>;
