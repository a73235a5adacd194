import { SmtpCommand, SmtpCommandType } from '../SmtpCommand';

describe('SmtpCommand', () => {
  it('encodes a command with arguments', () => {
    const command = new SmtpCommand(SmtpCommandType.Mail, ['FROM:<from@example.com>', 'BODY=8BITMIME']);

    expect(command.encode(true)).toBe('MAIL FROM:<from@example.com> BODY=8BITMIME\r\n');
  });

  it('encodes a bare continuation line', () => {
    expect(new SmtpCommand(null, 'dGVzdA==', true).encode(true)).toBe('dGVzdA==\r\n');
  });

  it('masks sensitive arguments for logging', () => {
    expect(new SmtpCommand(SmtpCommandType.Auth, ['PLAIN', 'AHRlc3QtdXNlcgB0ZXN0LXNlY3JldA=='], true).encode_safe()).toBe('AUTH ***');
    expect(new SmtpCommand(SmtpCommandType.Noop).encode_safe()).toBe('NOOP');
  });
});
