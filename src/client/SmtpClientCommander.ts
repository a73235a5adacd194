import net from "net";
import tls from "tls";
import winston from "winston";
import {SmtpCapabilityType} from "../shared/SmtpCapability";
import {SmtpClientCommanderConfig, SmtpClientConfig} from "../shared/SmtpConfig";
import {
  DEFAULT_DIAL_TIMEOUT,
  DEFAULT_LOCAL_NAME,
  DEFAULT_MIN_TLS_VERSION,
} from "../shared/SmtpConstants";
import {SmtpClient} from "./SmtpClient";
import {SmtpAuthMechanism, SmtpPlainAuth} from "./SmtpClientAuth";
import {
  SmtpClientCommanderCloseError,
  SmtpClientCommanderDialError,
  SmtpClientCommanderEnvelopeError,
  SmtpClientCommanderEnvelopeStage,
  SmtpClientCommanderInvalidAddressError,
  SmtpClientCommanderNegotiationError,
  SmtpClientCommanderNegotiationStage,
  SmtpClientCommanderNotConnectedError,
  SmtpClientCommanderTransmissionError,
  SmtpClientCommanderTransmissionStage,
  SmtpClientCommanderUnsupportedAuthError,
} from "./SmtpClientCommanderErrors";
import {
  SmtpClientConnection,
  SmtpClientDataWriter,
  SmtpClientDialer,
} from "./SmtpClientConnection";

export interface SmtpClientCommanderOptions extends SmtpClientCommanderConfig {
  dialer?: SmtpClientDialer;
}

/**
 * Joins host and port, bracketing IPv6 literals.
 * @param host the host.
 * @param port the port.
 */
export function smtp_join_host_port(host: string, port: number): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Checks a line for CR or LF (RFC 5321).
 * @param line the line.
 */
export function smtp_validate_line(line: string): void {
  if (/[\r\n]/.test(line)) {
    throw new SmtpClientCommanderInvalidAddressError(line);
  }
}

/**
 * Owns one connection to a relay: negotiates it, checks it with NOOP before reuse and
 * sends envelopes over it. Not safe for overlapping calls on one instance.
 *
 * PLAIN authentication is only configured for a non-empty login. With an
 * empty login AUTH is skipped, even when the relay offers it, and a relay
 * without AUTH is accepted instead of failing with UnsupportedAuthExtension.
 */
export class SmtpClientCommander {
  protected readonly _config: Readonly<SmtpClientConfig>;
  protected readonly _auth: SmtpAuthMechanism | null;
  protected readonly _dialer: SmtpClientDialer;
  protected readonly _dialTimeout: number;
  protected readonly _localName: string;
  protected readonly _tlsOptions: tls.ConnectionOptions;
  protected _logger?: winston.Logger;
  protected _client: SmtpClientConnection | null = null;

  /**
   * Constructs a new smtp client commander, nothing is sent until connect().
   * @param config the relay and credentials.
   * @param options the options.
   * @param logger the logger.
   */
  public constructor(
    config: SmtpClientConfig,
    options: SmtpClientCommanderOptions = {},
    logger?: winston.Logger
  ) {
    this._config = Object.freeze({...config});
    this._logger = logger;

    this._auth =
      config.login.length > 0
        ? new SmtpPlainAuth("", config.login, config.password, config.host)
        : null;

    this._dialer = options.dialer ?? SmtpClient.dial;
    this._dialTimeout = options.dial_timeout ?? DEFAULT_DIAL_TIMEOUT;
    this._localName = options.local_name ?? DEFAULT_LOCAL_NAME;
    this._tlsOptions = {
      ...options.tls,
      // SNI only takes host names, never IP literals.
      servername: net.isIP(config.host) === 0 ? config.host : undefined,
      host: config.host,
      minVersion: options.min_tls_version ?? DEFAULT_MIN_TLS_VERSION,
    };
  }

  ////////////////////////////////////////////////
  // Getters
  ////////////////////////////////////////////////

  public get config(): Readonly<SmtpClientConfig> {
    return this._config;
  }

  /**
   * If a negotiated connection is held (it may have died since).
   */
  public get connected(): boolean {
    return this._client !== null;
  }

  public get address(): string {
    return smtp_join_host_port(this._config.host, this._config.port);
  }

  ////////////////////////////////////////////////
  // Instance Methods
  ////////////////////////////////////////////////

  /**
   * Dials the relay, greets it, upgrades to TLS when offered and authenticates
   * when credentials are configured. Replaces the held connection on success.
   * @param signal bounds the dial and the negotiation.
   */
  public async connect(signal?: AbortSignal): Promise<void> {
    const address: string = this.address;

    let client: SmtpClientConnection;
    try {
      client = await this._dialer({
        host: this._config.host,
        port: this._config.port,
        timeout: this._dialTimeout,
        signal,
        logger: this._logger,
      });
    } catch (e) {
      throw new SmtpClientCommanderDialError(address, e);
    }

    try {
      await this._negotiate(client, signal);
    } catch (e) {
      this._logger?.debug(`Negotiation with ${address} failed, closing ...`);
      client.close();
      throw e;
    }

    if (this._client !== null) {
      this._client.close();
    }

    this._client = client;
    this._logger?.info(`Connected to ${address}.`);
  }

  /**
   * Sends NOOP over the held connection and reconnects once if that fails,
   * connects directly when nothing is held.
   * @param signal bounds the NOOP and a (re)connect.
   */
  public async ensureConnected(signal?: AbortSignal): Promise<void> {
    if (this._client === null) {
      return this.connect(signal);
    }

    try {
      await this._client.noop(signal);
      return;
    } catch (e) {
      this._logger?.warn(
        `NOOP failed, reconnecting to ${this.address}: ${
          e instanceof Error ? e.message : String(e)
        }`
      );
    }

    this._client.close();
    this._client = null;

    return this.connect(signal);
  }

  /**
   * Sends one message with MAIL, RCPT and DATA over the held connection.
   * @param to the envelope recipients, in order.
   * @param from the envelope sender.
   * @param payload the message, for example MimeMessage.build().
   */
  public async send(
    to: string[],
    from: string,
    payload: Buffer | string
  ): Promise<void> {
    smtp_validate_line(from);
    to.forEach((recipient: string): void => smtp_validate_line(recipient));

    if (this._client === null) {
      throw new SmtpClientCommanderNotConnectedError();
    }

    const client: SmtpClientConnection = this._client;
    this._logger?.debug(`Sending mail from: ${from}, to: ${to.join(", ")}.`);

    try {
      await client.mail(from);
    } catch (e) {
      throw new SmtpClientCommanderEnvelopeError(
        SmtpClientCommanderEnvelopeStage.MailFrom,
        from,
        e
      );
    }

    for (const recipient of to) {
      try {
        await client.rcpt(recipient);
      } catch (e) {
        throw new SmtpClientCommanderEnvelopeError(
          SmtpClientCommanderEnvelopeStage.RcptTo,
          recipient,
          e
        );
      }
    }

    let writer: SmtpClientDataWriter;
    try {
      writer = await client.data();
    } catch (e) {
      throw new SmtpClientCommanderTransmissionError(
        SmtpClientCommanderTransmissionStage.Data,
        e
      );
    }

    try {
      await writer.write(payload);
    } catch (e) {
      throw new SmtpClientCommanderTransmissionError(
        SmtpClientCommanderTransmissionStage.Write,
        e
      );
    }

    try {
      await writer.close();
    } catch (e) {
      throw new SmtpClientCommanderTransmissionError(
        SmtpClientCommanderTransmissionStage.End,
        e
      );
    }

    this._logger?.info(`Message from ${from} accepted for ${to.length} recipient(s).`);
  }

  /**
   * Sends QUIT and releases the connection, which is released even if QUIT fails.
   */
  public async close(): Promise<void> {
    if (this._client === null) {
      return;
    }

    const client: SmtpClientConnection = this._client;
    this._client = null;

    try {
      await client.quit();
    } catch (e) {
      client.close();
      throw new SmtpClientCommanderCloseError(e);
    }

    this._logger?.debug(`Closed connection to ${this.address}.`);
  }

  ////////////////////////////////////////////////
  // Negotiation
  ////////////////////////////////////////////////

  protected async _negotiate(
    client: SmtpClientConnection,
    signal?: AbortSignal
  ): Promise<void> {
    try {
      await client.hello(this._localName, signal);
    } catch (e) {
      throw new SmtpClientCommanderNegotiationError(
        SmtpClientCommanderNegotiationStage.Greeting,
        e
      );
    }

    if (client.extension(SmtpCapabilityType.StartTLS).supported) {
      this._logger?.debug("Server supports STARTTLS, upgrading ...");
      try {
        await client.startTLS(this._tlsOptions, signal);
      } catch (e) {
        throw new SmtpClientCommanderNegotiationError(
          SmtpClientCommanderNegotiationStage.Upgrade,
          e
        );
      }
    }

    if (this._auth === null) {
      return;
    }

    if (!client.extension(SmtpCapabilityType.Auth).supported) {
      throw new SmtpClientCommanderUnsupportedAuthError();
    }

    try {
      await client.auth(this._auth, signal);
    } catch (e) {
      throw new SmtpClientCommanderNegotiationError(
        SmtpClientCommanderNegotiationStage.Auth,
        e
      );
    }
  }
}
