import { smtp_client_config_from_env } from '../SmtpConfig';
import { SmtpConfigError } from '../SmtpError';

describe('smtp_client_config_from_env', () => {
  it('reads the relay and the credentials', () => {
    expect(
      smtp_client_config_from_env({
        SMTP_HOST: 'relay.example.com',
        SMTP_PORT: '587',
        SMTP_LOGIN: 'test-user',
        SMTP_PASSWORD: 'test-secret',
      }),
    ).toEqual({ host: 'relay.example.com', port: 587, login: 'test-user', password: 'test-secret' });
  });

  it('defaults to port 25 without credentials', () => {
    expect(smtp_client_config_from_env({ SMTP_HOST: 'relay.example.com' })).toEqual({
      host: 'relay.example.com',
      port: 25,
      login: '',
      password: '',
    });
  });

  it('requires a host', () => {
    expect(() => smtp_client_config_from_env({})).toThrow(SmtpConfigError);
  });

  it.each(['0', '65536', 'abc', '25.5'])('rejects port %s', (port) => {
    expect(() => smtp_client_config_from_env({ SMTP_HOST: 'relay.example.com', SMTP_PORT: port })).toThrow(
      `SMTP_PORT is not a valid port: '${port}'`,
    );
  });
});
