import { SEGMENT_SEPARATOR } from "./SmtpConstants";

export enum SmtpCapabilityType {
    Help = 'HELP',
    Expn = 'EXPN',
    SmtpEnhancedStatusCodes = 'ENHANCEDSTATUSCODES',
    StartTLS = 'STARTTLS',
    Chunking = 'CHUNKING',
    EightBitMIME = '8BITMIME',
    SmtpUTF8 = 'SMTPUTF8',
    Vrfy = 'VRFY',
    Size = 'SIZE',
    Auth = 'AUTH',
    Pipelining = 'PIPELINING',
    Dsn = 'DSN',
    RequireTLS = 'REQUIRETLS',
}

export class SmtpCapability {
    /**
     * Constructs a new smtp capability.
     * @param type the type of capability, unknown ones are kept as-is.
     * @param args the arguments.
     */
    public constructor(public readonly type: SmtpCapabilityType | string, public readonly args: string[] = []) { }

    /**
     * Decodes the given smtp capability line, for example 'AUTH LOGIN PLAIN'.
     * @param raw the capability to decode.
     */
    public static decode(raw: string): SmtpCapability {
        const segments: string[] = raw.trim().split(SEGMENT_SEPARATOR)
            .filter((segment: string): boolean => segment.length > 0);

        if (segments.length < 1) {
            throw new Error('Not enough segments.');
        }

        return new SmtpCapability(segments[0].toUpperCase(), segments.slice(1));
    }

    /**
     * Decodes many SMTP capabilities, empty lines are skipped.
     * @param lines the lines.
     * @param from start reading from line.
     */
    public static decode_many(lines: string[], from: number = 0): SmtpCapability[] {
        if (from > lines.length) {
            throw new Error('From is larger than the number of lines.');
        }

        return lines.slice(from)
            .filter((line: string): boolean => line.trim().length > 0)
            .map((line: string): SmtpCapability => SmtpCapability.decode(line));
    }
}
