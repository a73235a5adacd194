import { StringDecoder } from 'string_decoder';

export class SmtpDataBuffer {
    protected _data: string = '';
    protected _decoder: StringDecoder = new StringDecoder('utf-8');

    /**
     * Appends a chunk of incoming data, a character split over chunks is held back until complete.
     * @param chunk the chunk.
     */
    public write(chunk: Buffer | string): void {
        this._data += typeof chunk === 'string' ? chunk : this._decoder.write(chunk);
    }

    /**
     * Takes the next segment terminated by the given separator off the buffer.
     * @param separator the separator.
     * @returns the segment without the separator, or null if it's incomplete.
     */
    public segment(separator: string): string | null {
        const index: number = this._data.indexOf(separator);
        if (index === -1) {
            return null;
        }

        const segment: string = this._data.substring(0, index);
        this._data = this._data.substring(index + separator.length);
        return segment;
    }

    /**
     * The number of decoded characters not yet taken off the buffer.
     */
    public get size(): number {
        return this._data.length;
    }
}
