import tls from "tls";
import winston from "winston";
import { SmtpCapability } from "../shared/SmtpCapability";
import { SmtpCommand, SmtpCommandType } from "../shared/SmtpCommand";
import { SmtpResponse } from "../shared/SmtpResponse";
import { SmtpSocket } from "../shared/SmtpSocket";
import { SmtpAuthMechanism, SmtpServerInfo } from "./SmtpClientAuth";
import {
  SmtpClientConnection,
  SmtpClientDataWriter,
  SmtpClientDialOptions,
} from "./SmtpClientConnection";
import {
  SmtpClientError,
  SmtpClientErrorOrigin,
  SmtpClientTransactionError,
} from "./SmtpClientError";
import {
  smtp_client_server_opts_empty,
  smtp_client_server_opts_extension,
  smtp_client_server_opts_flags_string,
  smtp_client_server_opts_from_capabilities,
  SmtpClientExtension,
  SmtpClientServerFeatures,
  SmtpClientServerOpts,
} from "./SmtpClientServerConfig";
import { SmtpClientStream } from "./SmtpClientStream";
import { SmtpDotEscapeEncoder } from "./SmtpDotEscapeEncoder";

interface SmtpClientResponseWaiter {
  resolve: (response: SmtpResponse) => void;
  reject: (error: Error) => void;
}

export class SmtpClient implements SmtpClientConnection {
  protected _smtpStream: SmtpClientStream;
  protected _logger?: winston.Logger;
  protected _responses: SmtpResponse[] = [];
  protected _waiter: SmtpClientResponseWaiter | null = null;
  protected _failure: Error | null = null;
  protected _greeting: SmtpResponse | null = null;
  protected _localName: string | null = null;
  protected _serverOptions: SmtpClientServerOpts = smtp_client_server_opts_empty();

  /**
   * Constructs a new SMTP Client over a connected socket.
   * @param smtpSocket the socket.
   * @param serverName the configured server host, used for authentication.
   * @param logger the logger.
   */
  public constructor(
    protected readonly _smtpSocket: SmtpSocket,
    protected readonly _serverName: string,
    logger?: winston.Logger
  ) {
    this._logger = logger;
    this._smtpStream = new SmtpClientStream();

    // Registers the standard event listeners (for the socket).
    this._smtpSocket.on("data", (chunk: Buffer) =>
      this._smtpStream.write(chunk)
    );
    this._smtpSocket.on("error", (error: Error) =>
      this._fail(
        new SmtpClientError(SmtpClientErrorOrigin.Stream, error.message, {
          cause: error,
        })
      )
    );
    this._smtpSocket.on("close", () => this._handleClose());

    // Registers the standard event listeners (for the stream).
    this._smtpStream.on("response", (response: SmtpResponse) =>
      this._handleResponse(response)
    );
    this._smtpStream.on("error", (error: Error) => {
      this._fail(
        new SmtpClientError(SmtpClientErrorOrigin.Stream, error.message, {
          cause: error,
        })
      );
      this._smtpSocket.destroy();
    });
  }

  /**
   * Opens a TCP connection and wraps it in a client, the greeting is read by hello().
   * @param options the dial options.
   */
  public static async dial(options: SmtpClientDialOptions): Promise<SmtpClient> {
    const socket: SmtpSocket = await SmtpSocket.connect({
      host: options.host,
      port: options.port,
      timeout: options.timeout,
      signal: options.signal,
    });

    options.logger?.debug(`Connected to ${options.host}:${options.port}.`);
    return new SmtpClient(socket, options.host, options.logger);
  }

  ////////////////////////////////////////////////
  // Getters
  ////////////////////////////////////////////////

  public get secure(): boolean {
    return this._smtpSocket.secure;
  }

  /**
   * Gets the options derived from the last EHLO response.
   */
  public get serverOptions(): SmtpClientServerOpts {
    return this._serverOptions;
  }

  ////////////////////////////////////////////////
  // Commands
  ////////////////////////////////////////////////

  /**
   * Reads the 220 greeting, only the first call touches the connection.
   * @param signal the abort signal.
   */
  public async greeting(signal?: AbortSignal): Promise<SmtpResponse> {
    if (this._greeting !== null) {
      return this._greeting;
    }

    const response: SmtpResponse = await this.readResponse(signal);
    if (!response.matches(220)) {
      throw new SmtpClientTransactionError(null, response, 220);
    }

    this._greeting = response;
    return response;
  }

  public async hello(local_name: string, signal?: AbortSignal): Promise<void> {
    await this.greeting(signal);

    this._localName = local_name;

    try {
      await this._ehlo(signal);
    } catch (e) {
      if (!(e instanceof SmtpClientTransactionError)) {
        throw e;
      }

      this._logger?.debug("EHLO refused, falling back to HELO ...");
      await this._command(
        new SmtpCommand(SmtpCommandType.Helo, [local_name]),
        250,
        signal
      );
      this._serverOptions = smtp_client_server_opts_empty();
    }
  }

  public extension(name: string): SmtpClientExtension {
    return smtp_client_server_opts_extension(this._serverOptions, name);
  }

  /**
   * Sends STARTTLS, upgrades the socket and repeats EHLO over TLS.
   * @param options the TLS options (servername, minVersion, trust).
   * @param signal the abort signal.
   */
  public async startTLS(
    options: tls.ConnectionOptions,
    signal?: AbortSignal
  ): Promise<void> {
    if (this._localName === null) {
      throw new Error("STARTTLS is only allowed after hello().");
    }

    await this._command(
      new SmtpCommand(SmtpCommandType.StartTLS),
      220,
      signal
    );

    // Anything received after the 220 was sent in plaintext, before the upgrade.
    if (this._responses.length > 0 || this._smtpStream.buffered) {
      this._smtpSocket.destroy();
      throw new SmtpClientError(
        SmtpClientErrorOrigin.Stream,
        "Unexpected data after the STARTTLS response."
      );
    }

    try {
      await this._smtpSocket.upgrade(options, signal);
    } catch (e) {
      const cause: Error = e instanceof Error ? e : new Error(String(e));
      throw new SmtpClientError(
        SmtpClientErrorOrigin.Stream,
        `TLS upgrade failed: ${cause.message}`,
        { cause }
      );
    }

    this._logger?.debug("Connection is now upgraded, sending new EHLO ...");
    await this._ehlo(signal);
  }

  /**
   * Runs a SASL exchange with the given mechanism.
   * @param mechanism the mechanism.
   * @param signal the abort signal.
   */
  public async auth(
    mechanism: SmtpAuthMechanism,
    signal?: AbortSignal
  ): Promise<void> {
    const info: SmtpServerInfo = {
      name: this._serverName,
      tls: this.secure,
      auth: [...this._serverOptions.auth_mechanisms],
    };

    const start = mechanism.start(info);
    const args: string[] = [start.mechanism];
    if (start.initial_response !== null) {
      // An empty initial response is sent as '=' (RFC 4954).
      args.push(
        start.initial_response.length === 0
          ? "="
          : start.initial_response.toString("base64")
      );
    }

    let command: SmtpCommand = new SmtpCommand(SmtpCommandType.Auth, args, true);
    while (true) {
      await this._send(command);
      const response: SmtpResponse = await this.readResponse(signal);

      if (response.status === 235) {
        mechanism.next(Buffer.from(response.message_string, "utf-8"), false);
        this._logger?.debug(`Authenticated using ${start.mechanism}.`);
        return;
      }

      if (response.status !== 334) {
        throw new SmtpClientTransactionError(command, response, 235);
      }

      let answer: Buffer | null;
      try {
        answer = mechanism.next(
          Buffer.from(response.message_string, "base64"),
          true
        );
      } catch (e) {
        // Cancels the exchange, the server answers with 501.
        await this._send(new SmtpCommand(null, "*"));
        await this.readResponse(signal);
        throw e;
      }

      command = new SmtpCommand(
        null,
        (answer ?? Buffer.alloc(0)).toString("base64"),
        true
      );
    }
  }

  public async mail(from: string): Promise<void> {
    const args: string[] = [`FROM:<${from}>`];
    if (
      this._serverOptions.features.are_set(SmtpClientServerFeatures.EightBitMime)
    ) {
      args.push("BODY=8BITMIME");
    }

    await this._command(new SmtpCommand(SmtpCommandType.Mail, args), 250);
  }

  public async rcpt(to: string): Promise<void> {
    // Both 250 and 251 (forwarded) accept the recipient.
    await this._command(
      new SmtpCommand(SmtpCommandType.Rcpt, [`TO:<${to}>`]),
      25
    );
  }

  /**
   * Sends DATA, the returned writer dot-escapes the payload.
   */
  public async data(): Promise<SmtpClientDataWriter> {
    const command: SmtpCommand = new SmtpCommand(SmtpCommandType.Data);
    await this._command(command, 354);

    const encoder: SmtpDotEscapeEncoder = new SmtpDotEscapeEncoder();
    let closed: boolean = false;

    return {
      write: async (chunk: Buffer | string): Promise<void> => {
        if (closed) {
          throw new Error("The data writer is closed.");
        }

        await this._write(
          encoder.encode(
            typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk
          )
        );
      },
      close: async (): Promise<void> => {
        if (closed) {
          throw new Error("The data writer is closed.");
        }

        closed = true;
        await this._write(encoder.finish());

        const response: SmtpResponse = await this.readResponse();
        if (!response.matches(250)) {
          throw new SmtpClientTransactionError(command, response, 250);
        }
      },
    };
  }

  public async noop(signal?: AbortSignal): Promise<void> {
    await this._command(new SmtpCommand(SmtpCommandType.Noop), 250, signal);
  }

  public async quit(): Promise<void> {
    try {
      await this._command(new SmtpCommand(SmtpCommandType.Quit), 221);
    } finally {
      this._smtpSocket.close();
    }
  }

  public close(): void {
    this._smtpSocket.destroy();
  }

  ////////////////////////////////////////////////
  // Response Handling
  ////////////////////////////////////////////////

  /**
   * Reads the next response, queued ones first.
   * @param signal aborting destroys the connection.
   */
  public readResponse(signal?: AbortSignal): Promise<SmtpResponse> {
    const queued: SmtpResponse | undefined = this._responses.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }

    if (this._failure !== null) {
      return Promise.reject(this._failure);
    }

    return new Promise<SmtpResponse>((resolve, reject): void => {
      const on_abort = (): void => {
        this._waiter = null;
        this._smtpSocket.destroy();
        reject(
          new SmtpClientError(
            SmtpClientErrorOrigin.Aborted,
            "Aborted while waiting for a response.",
            { cause: signal?.reason }
          )
        );
      };

      if (signal?.aborted) {
        on_abort();
        return;
      }

      signal?.addEventListener("abort", on_abort, { once: true });
      this._waiter = {
        resolve: (response: SmtpResponse): void => {
          signal?.removeEventListener("abort", on_abort);
          resolve(response);
        },
        reject: (error: Error): void => {
          signal?.removeEventListener("abort", on_abort);
          reject(error);
        },
      };
    });
  }

  protected async _ehlo(signal?: AbortSignal): Promise<void> {
    if (this._localName === null) {
      throw new Error("EHLO requires a local name.");
    }

    const response: SmtpResponse = await this._command(
      new SmtpCommand(SmtpCommandType.Ehlo, [this._localName]),
      250,
      signal
    );

    // The first line carries the server name, not a capability.
    const capabilities: SmtpCapability[] = SmtpCapability.decode_many(
      response.message_lines,
      1
    );

    this._serverOptions = smtp_client_server_opts_from_capabilities(capabilities);
    this._logger?.debug(
      `Detected server size: ${
        this._serverOptions.max_message_size
      }, with detected features: ${smtp_client_server_opts_flags_string(
        this._serverOptions
      )}`
    );
  }

  protected async _command(
    command: SmtpCommand,
    expected: number,
    signal?: AbortSignal
  ): Promise<SmtpResponse> {
    await this._send(command);

    const response: SmtpResponse = await this.readResponse(signal);
    if (!response.matches(expected)) {
      throw new SmtpClientTransactionError(command, response, expected);
    }

    return response;
  }

  protected async _send(command: SmtpCommand): Promise<void> {
    this._logger?.debug(`>> ${command.encode_safe()}`);
    await this._write(command.encode(true));
  }

  protected async _write(data: string | Buffer): Promise<void> {
    if (this._failure !== null) {
      throw this._failure;
    }

    try {
      await this._smtpSocket.write(data);
    } catch (e) {
      const cause: Error = e instanceof Error ? e : new Error(String(e));
      throw new SmtpClientError(SmtpClientErrorOrigin.Stream, cause.message, {
        cause,
      });
    }
  }

  ////////////////////////////////////////////////
  // Event Listeners
  ////////////////////////////////////////////////

  protected _handleResponse(response: SmtpResponse): void {
    this._logger?.debug(`<< ${response.encode(false)}`);

    if (this._waiter === null) {
      this._responses.push(response);
      return;
    }

    const waiter: SmtpClientResponseWaiter = this._waiter;
    this._waiter = null;
    waiter.resolve(response);
  }

  protected _handleClose(): void {
    this._logger?.debug("Close event triggered.");

    this._fail(
      new SmtpClientError(
        SmtpClientErrorOrigin.Closed,
        "The connection was closed."
      )
    );
  }

  /**
   * Records the first failure and rejects the pending read.
   * @param error the error.
   */
  protected _fail(error: Error): void {
    if (this._failure === null) {
      this._failure = error;
    }

    if (this._waiter !== null) {
      const waiter: SmtpClientResponseWaiter = this._waiter;
      this._waiter = null;
      waiter.reject(this._failure);
    }
  }
}
