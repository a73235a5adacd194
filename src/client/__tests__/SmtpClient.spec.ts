import { once } from 'events';
import net from 'net';
import {
  SMTPServer,
  SMTPServerAddress,
  SMTPServerAuthentication,
  SMTPServerAuthenticationResponse,
  SMTPServerDataStream,
  SMTPServerSession,
} from 'smtp-server';
import { MimeMessage } from '../../mime/MimeMessage';
import { SmtpClientCommander } from '../SmtpClientCommander';
import { SmtpClientCommanderErrorKind } from '../SmtpClientCommanderErrors';
import { SmtpClientTransactionError } from '../SmtpClientError';

interface ReceivedMail {
  from: string;
  to: string[];
  data: string;
}

interface TestServer {
  server: SMTPServer;
  port: number;
  received: ReceivedMail[];
  connections: number;
  authenticated: Array<{ username: string; secure: boolean }>;
}

async function startServer(starttls: boolean): Promise<TestServer> {
  const state: Omit<TestServer, 'server' | 'port'> = {
    received: [],
    connections: 0,
    authenticated: [],
  };

  const server = new SMTPServer({
    logger: false,
    hideSTARTTLS: !starttls,
    authMethods: ['PLAIN'],
    allowInsecureAuth: true,
    disableReverseLookup: true,
    onConnect(_session: SMTPServerSession, callback: (err?: Error | null) => void) {
      state.connections++;
      callback();
    },
    onAuth(
      auth: SMTPServerAuthentication,
      session: SMTPServerSession,
      callback: (err: Error | null | undefined, response?: SMTPServerAuthenticationResponse) => void,
    ) {
      if (auth.username !== 'test-user' || auth.password !== 'test-secret') {
        callback(new Error('Invalid username or password'));
        return;
      }

      state.authenticated.push({ username: auth.username ?? '', secure: session.secure });
      callback(null, { user: auth.username });
    },
    onRcptTo(address: SMTPServerAddress, _session: SMTPServerSession, callback: (err?: Error | null) => void) {
      if (address.address === 'blocked@example.com') {
        callback(new Error('Mailbox unavailable'));
        return;
      }

      callback();
    },
    onData(stream: SMTPServerDataStream, session: SMTPServerSession, callback: (err?: Error | null) => void) {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        const mailFrom = session.envelope.mailFrom;
        state.received.push({
          from: mailFrom === false ? '' : mailFrom.address,
          to: session.envelope.rcptTo.map((rcpt) => rcpt.address),
          data: Buffer.concat(chunks).toString('utf-8'),
        });
        callback();
      });
    },
  });

  const listener = server.listen(0, '127.0.0.1');
  await once(listener, 'listening');

  const address = listener.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port.');
  }

  return {
    server,
    port: address.port,
    get received() {
      return state.received;
    },
    get connections() {
      return state.connections;
    },
    get authenticated() {
      return state.authenticated;
    },
  };
}

interface ScriptedServer {
  server: net.Server;
  port: number;
  commands: string[];
  errors: string[];
  sockets: net.Socket[];
}

type ScriptedReply = (line: string, socket: net.Socket) => 'tls' | void;

/**
 * A line-based server that answers with raw bytes. Once a reply returns 'tls'
 * the following bytes are handed to onHandshake instead of being parsed.
 */
async function startScriptedServer(reply: ScriptedReply, onHandshake?: () => void): Promise<ScriptedServer> {
  const commands: string[] = [];
  const errors: string[] = [];
  const sockets: net.Socket[] = [];

  const server = net.createServer((socket: net.Socket) => {
    sockets.push(socket);
    socket.on('error', (error: Error) => errors.push(error.message));

    let buffer = '';
    let handshake = false;
    socket.on('data', (chunk: Buffer) => {
      if (handshake) {
        onHandshake?.();
        return;
      }

      buffer += chunk.toString('latin1');
      let index: number;
      while (!handshake && (index = buffer.indexOf('\r\n')) !== -1) {
        const line = buffer.substring(0, index);
        buffer = buffer.substring(index + 2);
        commands.push(line);
        handshake = reply(line, socket) === 'tls';
      }
    });

    socket.write('220 test.local ESMTP\r\n');
  });

  server.listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Scripted server is not listening on a TCP port.');
  }

  return { server, port: address.port, commands, errors, sockets };
}

function stopScriptedServer(scripted: ScriptedServer): Promise<void> {
  scripted.sockets.forEach((socket: net.Socket) => socket.destroy());
  return new Promise<void>((resolve) => scripted.server.close(() => resolve()));
}

function stopServer(server: SMTPServer): Promise<void> {
  return new Promise<void>((resolve) => server.close(() => resolve()));
}

describe('SmtpClient against an in-process server', () => {
  let testServer: TestServer;
  let commander: SmtpClientCommander;

  afterEach(async () => {
    await commander.close();
    await stopServer(testServer.server);
  });

  describe('without STARTTLS', () => {
    beforeEach(async () => {
      testServer = await startServer(false);
      commander = new SmtpClientCommander({
        host: '127.0.0.1',
        port: testServer.port,
        login: 'test-user',
        password: 'test-secret',
      });
    });

    it('authenticates and delivers a built message', async () => {
      const message = new MimeMessage(['to@example.com'], 'from@example.com', 'Report', 'Hello.\r\n.dot line');
      message.attach('report.csv', Buffer.from('id,value\n1,2\n'));
      const payload = message.build();

      await commander.ensureConnected();
      await commander.send(['to@example.com'], 'from@example.com', payload);

      expect(testServer.authenticated).toEqual([{ username: 'test-user', secure: false }]);
      expect(testServer.received).toHaveLength(1);
      expect(testServer.received[0].from).toBe('from@example.com');
      expect(testServer.received[0].to).toEqual(['to@example.com']);
      expect(testServer.received[0].data.replace(/\r\n$/, '')).toBe(payload.toString('utf-8'));
    });

    it('reuses the connection across ensureConnected calls', async () => {
      await commander.ensureConnected();
      await commander.ensureConnected();
      await commander.send(['a@example.com'], 'from@example.com', 'first');
      await commander.ensureConnected();
      await commander.send(['b@example.com'], 'from@example.com', 'second');

      expect(testServer.connections).toBe(1);
      expect(testServer.received.map((mail) => mail.to)).toEqual([['a@example.com'], ['b@example.com']]);
    });

    it('reports the rejected recipient', async () => {
      await commander.connect();

      const error = await commander
        .send(['to@example.com', 'blocked@example.com'], 'from@example.com', 'x')
        .catch((e: unknown) => e);

      expect(error).toMatchObject({
        kind: SmtpClientCommanderErrorKind.EnvelopeRejected,
        address: 'blocked@example.com',
      });
      expect(testServer.received).toHaveLength(0);
    });

    it('fails authentication with the wrong password', async () => {
      commander = new SmtpClientCommander({
        host: '127.0.0.1',
        port: testServer.port,
        login: 'test-user',
        password: 'wrong-secret',
      });

      const error = await commander.connect().catch((e: unknown) => e);

      expect(error).toMatchObject({ kind: SmtpClientCommanderErrorKind.AuthFailed });
      const cause = error instanceof Error ? error.cause : undefined;
      expect(cause).toBeInstanceOf(SmtpClientTransactionError);
      expect(commander.connected).toBe(false);
    });
  });

  describe('with STARTTLS', () => {
    beforeEach(async () => {
      testServer = await startServer(true);
      commander = new SmtpClientCommander(
        {
          host: '127.0.0.1',
          port: testServer.port,
          login: 'test-user',
          password: 'test-secret',
        },
        { tls: { rejectUnauthorized: false } },
      );
    });

    it('upgrades before authenticating', async () => {
      await commander.connect();
      await commander.send(['to@example.com'], 'from@example.com', 'over tls');

      expect(testServer.authenticated).toEqual([{ username: 'test-user', secure: true }]);
      expect(testServer.received[0].data.replace(/\r\n$/, '')).toBe('over tls');
    });

    it('fails the upgrade when the certificate is not trusted', async () => {
      commander = new SmtpClientCommander({
        host: '127.0.0.1',
        port: testServer.port,
        login: 'test-user',
        password: 'test-secret',
      });

      await expect(commander.connect()).rejects.toMatchObject({
        kind: SmtpClientCommanderErrorKind.UpgradeFailed,
      });
      expect(testServer.authenticated).toHaveLength(0);
    });
  });

  describe('dialing', () => {
    let closedPort: number;

    beforeEach(async () => {
      testServer = await startServer(false);

      const reserved = net.createServer();
      reserved.listen(0, '127.0.0.1');
      await once(reserved, 'listening');
      const address = reserved.address();
      if (address === null || typeof address === 'string') {
        throw new Error('Reserved server is not listening on a TCP port.');
      }
      closedPort = address.port;
      await new Promise<void>((resolve) => reserved.close(() => resolve()));
    });

    it('reports a refused connection as a dial failure', async () => {
      commander = new SmtpClientCommander({ host: '127.0.0.1', port: closedPort, login: '', password: '' });

      await expect(commander.connect()).rejects.toMatchObject({
        kind: SmtpClientCommanderErrorKind.DialFailed,
        address: `127.0.0.1:${closedPort}`,
      });
    });

    it('does not dial with an aborted signal', async () => {
      commander = new SmtpClientCommander({ host: '127.0.0.1', port: testServer.port, login: '', password: '' });
      const controller = new AbortController();
      controller.abort();

      await expect(commander.connect(controller.signal)).rejects.toMatchObject({
        kind: SmtpClientCommanderErrorKind.DialFailed,
      });
      expect(testServer.connections).toBe(0);
    });
  });
});

describe('SmtpClient against a scripted server', () => {
  let scripted: ScriptedServer;
  let commander: SmtpClientCommander;

  afterEach(async () => {
    await commander.close();
    await stopScriptedServer(scripted);
  });

  it('refuses plaintext replies queued behind the STARTTLS response', async () => {
    scripted = await startScriptedServer((line: string, socket: net.Socket) => {
      if (line.startsWith('EHLO')) {
        socket.write('250-test.local\r\n250-STARTTLS\r\n250 AUTH PLAIN\r\n');
      } else if (line === 'STARTTLS') {
        socket.write('220 Ready\r\n250 test.local\r\n');
        return 'tls';
      }
    });
    commander = new SmtpClientCommander(
      { host: '127.0.0.1', port: scripted.port, login: 'test-user', password: 'test-secret' },
      { tls: { rejectUnauthorized: false } },
    );

    const error = await commander.connect().catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: SmtpClientCommanderErrorKind.UpgradeFailed });
    const cause = error instanceof Error ? error.cause : undefined;
    expect(cause).toBeInstanceOf(Error);
    expect(cause instanceof Error ? cause.message : '').toBe('Unexpected data after the STARTTLS response.');
    expect(scripted.commands.slice(0, 2)).toEqual(['EHLO localhost', 'STARTTLS']);
    expect(commander.connected).toBe(false);
  });

  it('aborts a stalled TLS handshake', async () => {
    const controller = new AbortController();
    scripted = await startScriptedServer(
      (line: string, socket: net.Socket) => {
        if (line.startsWith('EHLO')) {
          socket.write('250-test.local\r\n250 STARTTLS\r\n');
        } else if (line === 'STARTTLS') {
          socket.write('220 Ready\r\n');
          return 'tls';
        }
      },
      () => controller.abort(),
    );
    commander = new SmtpClientCommander(
      { host: '127.0.0.1', port: scripted.port, login: '', password: '' },
      { tls: { rejectUnauthorized: false } },
    );

    const error = await commander.connect(controller.signal).catch((e: unknown) => e);

    expect(error).toMatchObject({ kind: SmtpClientCommanderErrorKind.UpgradeFailed });
    const cause = error instanceof Error ? error.cause : undefined;
    expect(cause instanceof Error ? cause.message : '').toBe('TLS upgrade failed: TLS upgrade aborted.');
    expect(commander.connected).toBe(false);
  });

  it('aborts an unanswered NOOP', async () => {
    const controller = new AbortController();
    scripted = await startScriptedServer((line: string, socket: net.Socket) => {
      if (line.startsWith('EHLO')) {
        socket.write('250 test.local\r\n');
      } else if (line === 'NOOP') {
        controller.abort();
      }
    });
    commander = new SmtpClientCommander({ host: '127.0.0.1', port: scripted.port, login: '', password: '' });
    await commander.connect();

    // The reconnect after the failed NOOP runs under the same, now aborted, signal.
    await expect(commander.ensureConnected(controller.signal)).rejects.toMatchObject({
      kind: SmtpClientCommanderErrorKind.DialFailed,
    });
    expect(scripted.commands).toEqual(['EHLO localhost', 'NOOP']);
    expect(scripted.sockets).toHaveLength(1);
    expect(commander.connected).toBe(false);
  });
});
