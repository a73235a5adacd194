export const SEGMENT_SEPARATOR: string = ' ';
export const LINE_SEPARATOR: string = '\r\n';

export const DEFAULT_PORT: number = 25;
export const DEFAULT_DIAL_TIMEOUT: number = 30 * 1000; // 30s
export const DEFAULT_LOCAL_NAME: string = 'localhost';
export const DEFAULT_MIN_TLS_VERSION = 'TLSv1.2' as const;
