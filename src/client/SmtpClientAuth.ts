export interface SmtpServerInfo {
  name: string; // The configured server host.
  tls: boolean; // If the connection is upgraded.
  auth: string[]; // The advertised mechanisms.
}

export interface SmtpAuthStart {
  mechanism: string;
  initial_response: Buffer | null;
}

/**
 * A SASL mechanism driven by SmtpClient.auth().
 */
export interface SmtpAuthMechanism {
  start(server: SmtpServerInfo): SmtpAuthStart;

  /**
   * Answers a server challenge, returning null when there is nothing more to send.
   * @param challenge the decoded challenge, or the final message.
   * @param more if the server expects an answer.
   */
  next(challenge: Buffer, more: boolean): Buffer | null;
}

const LOCALHOST_NAMES: ReadonlySet<string> = new Set([
  "localhost",
  "127.0.0.1",
  "::1",
]);

export class SmtpPlainAuth implements SmtpAuthMechanism {
  /**
   * Constructs a new PLAIN mechanism (RFC 4616).
   * @param identity the authorization identity, usually empty.
   * @param username the username.
   * @param password the password.
   * @param host the host the credentials may be sent to.
   */
  public constructor(
    public readonly identity: string,
    public readonly username: string,
    protected readonly _password: string,
    public readonly host: string
  ) {}

  public start(server: SmtpServerInfo): SmtpAuthStart {
    // Credentials only travel in the clear to the local machine.
    if (!server.tls && !LOCALHOST_NAMES.has(server.name)) {
      throw new Error("Refusing PLAIN authentication over an unencrypted connection.");
    }

    if (server.name !== this.host) {
      throw new Error(`Wrong host name: ${server.name}, expected: ${this.host}`);
    }

    return {
      mechanism: "PLAIN",
      initial_response: Buffer.from(
        `${this.identity}\0${this.username}\0${this._password}`,
        "utf-8"
      ),
    };
  }

  public next(challenge: Buffer, more: boolean): Buffer | null {
    if (more) {
      throw new Error("Unexpected server challenge during PLAIN authentication.");
    }

    return null;
  }
}
