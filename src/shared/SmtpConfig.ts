import { SecureVersion } from "tls";
import { DEFAULT_PORT } from "./SmtpConstants";
import { SmtpConfigError } from "./SmtpError";

/**
 * One relay endpoint and one credential pair.
 */
export interface SmtpClientConfig {
    readonly host: string,
    readonly port: number,
    readonly login: string,
    readonly password: string,
}

export interface SmtpClientTLSOptions {
    rejectUnauthorized?: boolean,           // Defaults to true.
    ca?: string | Buffer | Array<string | Buffer>,
}

export interface SmtpClientCommanderConfig {
    dial_timeout?: number,                  // The number of ms to wait for the TCP connect.
    local_name?: string,                    // The name sent with EHLO/ HELO.
    min_tls_version?: SecureVersion,        // The lowest TLS version accepted on STARTTLS.
    tls?: SmtpClientTLSOptions,             // Extra options for the STARTTLS upgrade.
}

/**
 * Reads the client config from the environment (SMTP_HOST, SMTP_PORT, SMTP_LOGIN, SMTP_PASSWORD).
 * @param env the environment.
 */
export function smtp_client_config_from_env(env: NodeJS.ProcessEnv = process.env): SmtpClientConfig {
    const host: string = (env.SMTP_HOST ?? '').trim();
    if (host.length === 0) {
        throw new SmtpConfigError('SMTP_HOST is not set.');
    }

    let port: number = DEFAULT_PORT;
    const raw_port: string | undefined = env.SMTP_PORT?.trim();
    if (raw_port !== undefined && raw_port.length > 0) {
        port = Number(raw_port);
        if (!Number.isInteger(port) || port < 1 || port > 65535) {
            throw new SmtpConfigError(`SMTP_PORT is not a valid port: '${raw_port}'`);
        }
    }

    return {
        host,
        port,
        login: env.SMTP_LOGIN ?? '',
        password: env.SMTP_PASSWORD ?? '',
    };
}
