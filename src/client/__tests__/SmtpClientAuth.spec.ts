import { SmtpPlainAuth } from '../SmtpClientAuth';

describe('SmtpPlainAuth', () => {
  const auth = new SmtpPlainAuth('', 'test-user', 'test-secret', 'relay.example.com');

  it('builds the PLAIN initial response over TLS', () => {
    const start = auth.start({ name: 'relay.example.com', tls: true, auth: ['PLAIN'] });

    expect(start.mechanism).toBe('PLAIN');
    expect(start.initial_response?.toString('utf-8')).toBe('\0test-user\0test-secret');
  });

  it('refuses an unencrypted connection to a remote host', () => {
    expect(() => auth.start({ name: 'relay.example.com', tls: false, auth: ['PLAIN'] })).toThrow(
      'Refusing PLAIN authentication over an unencrypted connection.',
    );
  });

  it('allows an unencrypted connection to localhost', () => {
    const local = new SmtpPlainAuth('', 'test-user', 'test-secret', '127.0.0.1');

    expect(local.start({ name: '127.0.0.1', tls: false, auth: [] }).mechanism).toBe('PLAIN');
  });

  it('refuses a different host name', () => {
    expect(() => auth.start({ name: 'other.example.com', tls: true, auth: ['PLAIN'] })).toThrow(
      'Wrong host name: other.example.com, expected: relay.example.com',
    );
  });

  it('has nothing more to send after success', () => {
    expect(auth.next(Buffer.from('2.7.0 Authentication successful'), false)).toBeNull();
  });

  it('rejects further challenges', () => {
    expect(() => auth.next(Buffer.alloc(0), true)).toThrow('Unexpected server challenge during PLAIN authentication.');
  });
});
