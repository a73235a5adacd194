import net from 'net';
import { EventEmitter } from 'events';
import tls from 'tls';

export interface SmtpSocketConnectOptions {
    host: string,
    port: number,
    timeout: number,
    signal?: AbortSignal,
}

export declare interface SmtpSocket {
    on(event: 'close', listener: () => void): this;
    on(event: 'data', listener: (chunk: Buffer) => void): this;
    on(event: 'error', listener: (error: Error) => void): this;
}

export class SmtpSocket extends EventEmitter {
    protected _handlers = {
        close: (): void => this._event_close(),
        data: (chunk: Buffer): void => this._event_data(chunk),
        error: (error: Error): void => this._event_error(error),
    };

    protected _closed: boolean = false;

    /**
     * Constructs a new SmtpSocket around a connected socket.
     * @param socket the socket.
     * @param secure if the socket is secure.
     */
    public constructor(protected _socket: net.Socket | tls.TLSSocket, protected _secure: boolean = false) {
        super();

        this._attach();
    }

    ////////////////////////////////////////////////
    // Static Methods
    ////////////////////////////////////////////////

    /**
     * Opens a plain TCP connection, bounded by the timeout and the abort signal.
     * @param options the connect options.
     */
    public static connect(options: SmtpSocketConnectOptions): Promise<SmtpSocket> {
        const { host, port, timeout, signal } = options;

        return new Promise<SmtpSocket>((resolve, reject): void => {
            if (signal?.aborted) {
                reject(signal.reason);
                return;
            }

            const socket: net.Socket = net.connect({ host, port });

            const cleanup = (): void => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', on_abort);
                socket.removeListener('connect', on_connect);
                socket.removeListener('error', on_error);
            };

            const on_connect = (): void => {
                cleanup();
                resolve(new SmtpSocket(socket, false));
            };

            const on_error = (error: Error): void => {
                cleanup();
                socket.destroy();
                reject(error);
            };

            const on_abort = (): void => {
                on_error(signal?.reason instanceof Error ? signal.reason : new Error('Connect aborted.'));
            };

            const timer: NodeJS.Timeout = setTimeout((): void => {
                on_error(new Error(`Connect timed out after ${timeout}ms.`));
            }, timeout);

            socket.once('connect', on_connect);
            socket.once('error', on_error);
            signal?.addEventListener('abort', on_abort, { once: true });
        });
    }

    ////////////////////////////////////////////////
    // Getters
    ////////////////////////////////////////////////

    /**
     * If the socket is wrapped in TLS.
     */
    public get secure(): boolean {
        return this._secure;
    }

    ////////////////////////////////////////////////
    // Instance Methods
    ////////////////////////////////////////////////

    /**
     * Writes the given data to the socket.
     * @param data the data to write.
     */
    public write(data: string | Buffer): Promise<void> {
        return new Promise<void>((resolve, reject): void => {
            if (this._closed) {
                reject(new Error('Socket is closed.'));
                return;
            }

            this._socket.write(data, (error?: Error | null): void => {
                if (error) {
                    reject(error);
                    return;
                }

                resolve();
            });
        });
    }

    /**
     * Ends the socket gracefully.
     */
    public close(): void {
        this._socket.end();
    }

    /**
     * Tears the socket down immediately.
     */
    public destroy(): void {
        this._socket.destroy();
    }

    /**
     * Upgrades the current socket to TLS, the server identity is verified unless disabled.
     * @param options the TLS options.
     * @param signal aborting destroys the socket mid-handshake.
     */
    public upgrade(options: tls.ConnectionOptions, signal?: AbortSignal): Promise<void> {
        if (this._secure) {
            return Promise.resolve();
        }

        if (signal?.aborted) {
            this._socket.destroy();
            this._closed = true;
            return Promise.reject(new Error('TLS upgrade aborted.', { cause: signal.reason }));
        }

        const plain: net.Socket = this._socket;
        this._detach();

        return new Promise<void>((resolve, reject): void => {
            const secure: tls.TLSSocket = tls.connect({ ...options, socket: plain });

            const on_error = (error: Error): void => {
                secure.removeListener('secureConnect', on_secure);
                signal?.removeEventListener('abort', on_abort);
                secure.destroy();
                plain.destroy();
                this._closed = true;
                reject(error);
            };

            const on_abort = (): void => {
                on_error(new Error('TLS upgrade aborted.', { cause: signal?.reason }));
            };

            const on_secure = (): void => {
                secure.removeListener('error', on_error);
                signal?.removeEventListener('abort', on_abort);

                this._socket = secure;
                this._secure = true;
                this._attach();

                resolve();
            };

            secure.once('secureConnect', on_secure);
            secure.once('error', on_error);
            signal?.addEventListener('abort', on_abort, { once: true });
        });
    }

    ////////////////////////////////////////////////
    // Private Instance Methods
    ////////////////////////////////////////////////

    /**
     * Registers the event listeners on the current socket.
     */
    protected _attach(): void {
        this._socket.on('close', this._handlers.close);
        this._socket.on('data', this._handlers.data);
        this._socket.on('error', this._handlers.error);
    }

    /**
     * Removes the event listeners from the current socket.
     */
    protected _detach(): void {
        this._socket.removeListener('close', this._handlers.close);
        this._socket.removeListener('data', this._handlers.data);
        this._socket.removeListener('error', this._handlers.error);
    }

    ////////////////////////////////////////////////
    // Event Listeners
    ////////////////////////////////////////////////

    /**
     * Gets called when the socket was closed.
     */
    protected _event_close(): void {
        this._closed = true;
        this.emit('close');
    }

    /**
     * Gets called when there is data available.
     * @param data the data.
     */
    protected _event_data(data: Buffer): void {
        this.emit('data', data);
    }

    /**
     * Gets called when an error occurred, the close event follows.
     * @param err the error.
     */
    protected _event_error(err: Error): void {
        this._socket.destroy();
        this.emit('error', err);
    }
}
