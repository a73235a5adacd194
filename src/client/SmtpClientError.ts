import {SmtpCommand} from "../shared/SmtpCommand";
import {SmtpResponse} from "../shared/SmtpResponse";

export enum SmtpClientErrorOrigin {
    Stream = "stream",             // The socket or response stream failed.
    Closed = "closed",             // The connection closed while waiting.
    Aborted = "aborted",           // The abort signal fired while waiting.
    Transaction = "transaction",   // The server replied with an unexpected code.
}

export class SmtpClientError extends Error {
    /**
     * Constructs a new SmtpClientError.
     * @param origin The origin of the error
     * @param message The message associated with it.
     * @param options the error options (cause).
     */
    public constructor(public readonly origin: SmtpClientErrorOrigin,
                       message: string,
                       options?: ErrorOptions) {
        super(message, options);
        this.name = "SmtpClientError";
    }
}

export class SmtpClientTransactionError extends SmtpClientError {
    /**
     * Constructs a new SmtpClientTransactionError.
     * @param command The client command, null for the greeting.
     * @param response The server response.
     * @param expected The expected status code.
     */
    public constructor (public readonly command: SmtpCommand | null,
                        public readonly response: SmtpResponse,
                        public readonly expected: number) {
        super(
            SmtpClientErrorOrigin.Transaction,
            `${command === null ? "Greeting" : command.encode_safe()}: expected status ${expected}, got ${response.status} ${response.message_string}`.trim()
        );
        this.name = "SmtpClientTransactionError";
    }
}
