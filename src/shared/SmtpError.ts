export class SmtpSyntaxError extends Error {}

export class SmtpConfigError extends Error {}
