/////////////////////////////////////////////
// Base commander error
/////////////////////////////////////////////

export enum SmtpClientCommanderErrorKind {
  DialFailed = "dial-failed",
  GreetingFailed = "greeting-failed",
  UpgradeFailed = "upgrade-failed",
  AuthFailed = "auth-failed",
  UnsupportedAuthExtension = "unsupported-auth-extension",
  NotConnected = "not-connected",
  InvalidAddress = "invalid-address",
  EnvelopeRejected = "envelope-rejected",
  TransmissionFailed = "transmission-failed",
  CloseFailed = "close-failed",
}

export class SmtpClientCommanderError extends Error {
  public constructor(
    public readonly kind: SmtpClientCommanderErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SmtpClientCommanderError";
  }

  /**
   * Gets the label of the error.
   */
  get label(): string {
    return "General";
  }
}

/**
 * Describes an unknown thrown value for a message.
 * @param cause the thrown value.
 */
function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/////////////////////////////////////////////
// Connect Errors
/////////////////////////////////////////////

export class SmtpClientCommanderDialError extends SmtpClientCommanderError {
  /**
   * Constructs a new dial error.
   * @param address the host:port that could not be reached.
   * @param cause the transport error.
   */
  public constructor(public readonly address: string, cause: unknown) {
    super(
      SmtpClientCommanderErrorKind.DialFailed,
      `Failed to connect, address: ${address}: ${describe(cause)}`,
      cause
    );
  }

  get label(): string {
    return "Networking";
  }
}

export enum SmtpClientCommanderNegotiationStage {
  Greeting = "greeting",
  Upgrade = "upgrade",
  Auth = "auth",
}

const NEGOTIATION_KINDS: Record<
  SmtpClientCommanderNegotiationStage,
  SmtpClientCommanderErrorKind
> = {
  [SmtpClientCommanderNegotiationStage.Greeting]:
    SmtpClientCommanderErrorKind.GreetingFailed,
  [SmtpClientCommanderNegotiationStage.Upgrade]:
    SmtpClientCommanderErrorKind.UpgradeFailed,
  [SmtpClientCommanderNegotiationStage.Auth]:
    SmtpClientCommanderErrorKind.AuthFailed,
};

export class SmtpClientCommanderNegotiationError extends SmtpClientCommanderError {
  public constructor(
    public readonly stage: SmtpClientCommanderNegotiationStage,
    cause: unknown
  ) {
    super(
      NEGOTIATION_KINDS[stage],
      `Negotiation failed at ${stage}: ${describe(cause)}`,
      cause
    );
  }

  get label(): string {
    return "Negotiation";
  }
}

export class SmtpClientCommanderUnsupportedAuthError extends SmtpClientCommanderError {
  public constructor() {
    super(
      SmtpClientCommanderErrorKind.UnsupportedAuthExtension,
      "Extension is unsupported by the SMTP server, extension: AUTH"
    );
  }

  get label(): string {
    return "Negotiation";
  }
}

/////////////////////////////////////////////
// Send Errors
/////////////////////////////////////////////

export class SmtpClientCommanderNotConnectedError extends SmtpClientCommanderError {
  public constructor() {
    super(
      SmtpClientCommanderErrorKind.NotConnected,
      "Client not connected, call connect() or ensureConnected() first."
    );
  }
}

export class SmtpClientCommanderInvalidAddressError extends SmtpClientCommanderError {
  public constructor(public readonly address: string) {
    super(
      SmtpClientCommanderErrorKind.InvalidAddress,
      `A line must not contain CR or LF: ${JSON.stringify(address)}`
    );
  }

  get label(): string {
    return "Validation";
  }
}

export enum SmtpClientCommanderEnvelopeStage {
  MailFrom = "mail-from",
  RcptTo = "rcpt-to",
}

export class SmtpClientCommanderEnvelopeError extends SmtpClientCommanderError {
  /**
   * Constructs a new envelope error.
   * @param stage MAIL FROM or RCPT TO.
   * @param address the sender or the rejected recipient.
   * @param cause the transaction error.
   */
  public constructor(
    public readonly stage: SmtpClientCommanderEnvelopeStage,
    public readonly address: string,
    cause: unknown
  ) {
    super(
      SmtpClientCommanderErrorKind.EnvelopeRejected,
      `Envelope rejected at ${stage} <${address}>: ${describe(cause)}`,
      cause
    );
  }

  get label(): string {
    return "Transaction";
  }
}

export enum SmtpClientCommanderTransmissionStage {
  Data = "data",
  Write = "write",
  End = "end",
}

export class SmtpClientCommanderTransmissionError extends SmtpClientCommanderError {
  public constructor(
    public readonly stage: SmtpClientCommanderTransmissionStage,
    cause: unknown
  ) {
    super(
      SmtpClientCommanderErrorKind.TransmissionFailed,
      `Transmission failed at ${stage}: ${describe(cause)}`,
      cause
    );
  }

  get label(): string {
    return "Transaction";
  }
}

/////////////////////////////////////////////
// Close Error
/////////////////////////////////////////////

export class SmtpClientCommanderCloseError extends SmtpClientCommanderError {
  public constructor(cause: unknown) {
    super(
      SmtpClientCommanderErrorKind.CloseFailed,
      `Failed to quit: ${describe(cause)}`,
      cause
    );
  }

  get label(): string {
    return "Networking";
  }
}
