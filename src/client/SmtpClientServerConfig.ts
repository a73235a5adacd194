import {Flags} from "../helpers/Flags";
import {SmtpCapability, SmtpCapabilityType} from "../shared/SmtpCapability";

export enum SmtpClientServerFeatures {
    Pipelining = (1 << 0),
    StartTLS = (1 << 1),
    EightBitMime = (1 << 2),
    SMTP_UTF8 = (1 << 3),
    Authentication = (1 << 4),
    Verification = (1 << 5),
    Chunking = (1 << 6),
    Expand = (1 << 7),
}

export interface SmtpClientServerOpts {
    max_message_size: number | null;
    features: Flags<SmtpClientServerFeatures>;
    auth_mechanisms: string[];
    extensions: Map<string, string>;    // Upper case keyword to its parameters.
}

export interface SmtpClientExtension {
    supported: boolean;
    parameters: string;
}

/**
 * Gets the empty options of a server which only speaks HELO.
 */
export function smtp_client_server_opts_empty(): SmtpClientServerOpts {
    return {
        max_message_size: null,
        features: new Flags<SmtpClientServerFeatures>(),
        auth_mechanisms: [],
        extensions: new Map<string, string>(),
    };
}

/**
 * Looks an extension up by keyword, case-insensitive.
 * @param opts the server options.
 * @param name the extension keyword.
 */
export function smtp_client_server_opts_extension(opts: SmtpClientServerOpts, name: string): SmtpClientExtension {
    const parameters: string | undefined = opts.extensions.get(name.toUpperCase());
    return {
        supported: parameters !== undefined,
        parameters: parameters ?? '',
    };
}

export function smtp_client_server_opts_flags_string(opts: SmtpClientServerOpts): string {
    const arr: string[] = [];

    for (const [key, value] of Object.entries(SmtpClientServerFeatures)) {
        if (typeof value === 'number' && opts.features.are_set(value)) {
            arr.push(key);
        }
    }

    return arr.join(', ');
}

export function smtp_client_server_opts_from_capabilities(capabilities: SmtpCapability[]): SmtpClientServerOpts {
    const result: SmtpClientServerOpts = smtp_client_server_opts_empty();

    capabilities.forEach((capability: SmtpCapability): void => {
        result.extensions.set(capability.type, capability.args.join(' '));

        switch (capability.type) {
            case SmtpCapabilityType.Auth:
                result.features.set(SmtpClientServerFeatures.Authentication);
                result.auth_mechanisms = capability.args.map((arg: string): string => arg.toUpperCase());
                break;
            case SmtpCapabilityType.Chunking:
                result.features.set(SmtpClientServerFeatures.Chunking);
                break;
            case SmtpCapabilityType.Vrfy:
                result.features.set(SmtpClientServerFeatures.Verification);
                break;
            case SmtpCapabilityType.Expn:
                result.features.set(SmtpClientServerFeatures.Expand);
                break;
            case SmtpCapabilityType.EightBitMIME:
                result.features.set(SmtpClientServerFeatures.EightBitMime);
                break;
            case SmtpCapabilityType.SmtpUTF8:
                result.features.set(SmtpClientServerFeatures.SMTP_UTF8);
                break;
            case SmtpCapabilityType.Pipelining:
                result.features.set(SmtpClientServerFeatures.Pipelining);
                break;
            case SmtpCapabilityType.StartTLS:
                result.features.set(SmtpClientServerFeatures.StartTLS);
                break;
            case SmtpCapabilityType.Size: {
                // SIZE without a value means no fixed limit.
                const size: number = parseInt(capability.args[0] ?? '', 10);
                result.max_message_size = Number.isNaN(size) || size === 0 ? null : size;
                break;
            }
            default:
                break;
        }
    });

    return result;
}
