import { LINE_SEPARATOR, SEGMENT_SEPARATOR } from "./SmtpConstants";
import { SmtpSyntaxError } from "./SmtpError";

export class SmtpResponse {
    public constructor(public readonly status: number,
        public readonly message: string | string[] | null = null) { }

    /**
     * Encodes the response, multi-line messages use the continuation separator.
     * @param add_newline if the final line separator should be added.
     */
    public encode(add_newline: boolean = true): string {
        const lines: string[] = this.message_lines;
        if (lines.length === 0) {
            return `${this.status}${add_newline ? LINE_SEPARATOR : ''}`;
        }

        const result: string = lines.map((line: string, index: number): string => {
            const separator: string = index + 1 < lines.length ? '-' : SEGMENT_SEPARATOR;
            return `${this.status}${separator}${line}`;
        }).join(LINE_SEPARATOR);

        return add_newline ? result + LINE_SEPARATOR : result;
    }

    /**
     * Gets the message lines.
     */
    public get message_lines(): string[] {
        if (this.message === null) {
            return [];
        }

        return typeof this.message === 'string' ? [ this.message ] : this.message;
    }

    /**
     * Gets the message in string format, lines joined by a newline.
     */
    public get message_string(): string {
        return this.message_lines.join('\n');
    }

    /**
     * Checks if the status starts with the given code (1 to 3 digits).
     * @param expected the expected code, for example 250 or 25.
     */
    public matches(expected: number): boolean {
        const status: string = this.status.toString();
        return status.startsWith(expected.toString());
    }

    /**
     * The generator to decode a response, fed one line at a time.
     * @returns the decoded response.
     */
    public static *fancy_decode(): Generator<void, SmtpResponse, string> {
        let status: number | null = null;
        const message: string[] = [];

        while (true) {
            const segment: string = yield;

            const segment_status: number = parseInt(segment.substring(0, 3), 10);
            if (segment.length < 3 || Number.isNaN(segment_status)) {
                throw new SmtpSyntaxError(`Invalid response line: '${segment}'`);
            }

            // A bare status code is treated as the final line.
            const segment_separator: string = segment.length > 3 ? segment.charAt(3) : SEGMENT_SEPARATOR;
            const segment_message: string = segment.substring(4);

            if (status === null) {
                status = segment_status;
            } else if (status !== segment_status) {
                throw new SmtpSyntaxError('Segment status mismatch.');
            }

            message.push(segment_message);

            if (segment_separator === '-') {
                continue;
            } else if (segment_separator === SEGMENT_SEPARATOR) {
                break;
            }

            throw new SmtpSyntaxError('Invalid segment separator.');
        }

        return new SmtpResponse(status, message);
    }
}
