import { SmtpClient } from "./client/SmtpClient";
import {
  SmtpClientCommander,
  SmtpClientCommanderOptions,
  smtp_join_host_port,
  smtp_validate_line,
} from "./client/SmtpClientCommander";
import {
  SmtpClientCommanderError,
  SmtpClientCommanderErrorKind,
  SmtpClientCommanderDialError,
  SmtpClientCommanderNegotiationError,
  SmtpClientCommanderNegotiationStage,
  SmtpClientCommanderUnsupportedAuthError,
  SmtpClientCommanderNotConnectedError,
  SmtpClientCommanderInvalidAddressError,
  SmtpClientCommanderEnvelopeError,
  SmtpClientCommanderEnvelopeStage,
  SmtpClientCommanderTransmissionError,
  SmtpClientCommanderTransmissionStage,
  SmtpClientCommanderCloseError,
} from "./client/SmtpClientCommanderErrors";
import {
  SmtpClientConnection,
  SmtpClientDataWriter,
  SmtpClientDialer,
  SmtpClientDialOptions,
} from "./client/SmtpClientConnection";
import {
  SmtpClientError,
  SmtpClientErrorOrigin,
  SmtpClientTransactionError,
} from "./client/SmtpClientError";
import {
  SmtpAuthMechanism,
  SmtpPlainAuth,
  SmtpServerInfo,
} from "./client/SmtpClientAuth";
import { SmtpClientServerFeatures } from "./client/SmtpClientServerConfig";
import { SmtpDotEscapeEncoder } from "./client/SmtpDotEscapeEncoder";
import { createLogger, LoggerLevel } from "./helpers/Logger";
import { MimeMessage, MimeAttachment, MIME_BOUNDARY } from "./mime/MimeMessage";
import { SmtpCapability, SmtpCapabilityType } from "./shared/SmtpCapability";
import { SmtpCommand, SmtpCommandType } from "./shared/SmtpCommand";
import {
  SmtpClientConfig,
  SmtpClientCommanderConfig,
  SmtpClientTLSOptions,
  smtp_client_config_from_env,
} from "./shared/SmtpConfig";
import { SmtpConfigError, SmtpSyntaxError } from "./shared/SmtpError";
import { SmtpResponse } from "./shared/SmtpResponse";
import { SmtpSocket } from "./shared/SmtpSocket";

export {
  SmtpClient,
  SmtpClientCommander,
  SmtpClientCommanderError,
  SmtpClientCommanderErrorKind,
  SmtpClientCommanderDialError,
  SmtpClientCommanderNegotiationError,
  SmtpClientCommanderNegotiationStage,
  SmtpClientCommanderUnsupportedAuthError,
  SmtpClientCommanderNotConnectedError,
  SmtpClientCommanderInvalidAddressError,
  SmtpClientCommanderEnvelopeError,
  SmtpClientCommanderEnvelopeStage,
  SmtpClientCommanderTransmissionError,
  SmtpClientCommanderTransmissionStage,
  SmtpClientCommanderCloseError,
  SmtpClientError,
  SmtpClientErrorOrigin,
  SmtpClientTransactionError,
  SmtpPlainAuth,
  SmtpClientServerFeatures,
  SmtpDotEscapeEncoder,
  MimeMessage,
  MIME_BOUNDARY,
  SmtpCapability,
  SmtpCapabilityType,
  SmtpCommand,
  SmtpCommandType,
  SmtpConfigError,
  SmtpSyntaxError,
  SmtpResponse,
  SmtpSocket,
  LoggerLevel,
  createLogger,
  smtp_client_config_from_env,
  smtp_join_host_port,
  smtp_validate_line,
};

export type {
  SmtpClientCommanderOptions,
  SmtpClientConnection,
  SmtpClientDataWriter,
  SmtpClientDialer,
  SmtpClientDialOptions,
  SmtpAuthMechanism,
  SmtpServerInfo,
  MimeAttachment,
  SmtpClientConfig,
  SmtpClientCommanderConfig,
  SmtpClientTLSOptions,
};
