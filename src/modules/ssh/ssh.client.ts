// ─── Cliente SSH para equipos de red ─────────────────────────────────────────
// Abre una sesión por comando, probando las credenciales configuradas en orden.
// Cada intento de conexión (TCP + banner + auth) y cada comando tienen su
// propio timeout. La sesión se cierra siempre, salga bien o mal.

import { Client, ClientChannel } from 'ssh2';
import { Credential } from '../../types';
import { TimeoutError, withTimeout } from '../../utils/concurrency';
import { firstSuccess } from '../../utils/fallback';
import { errorMessage, logger } from '../../utils/logger';

// ─── Errores ─────────────────────────────────────────────────────────────────

export type SessionErrorKind = 'auth' | 'connect' | 'timeout' | 'exec';

export class SessionError extends Error {
  constructor(readonly kind: SessionErrorKind, message: string) {
    super(message);
    this.name = 'SessionError';
  }
}

// ─── Contratos ───────────────────────────────────────────────────────────────

export interface RemoteSession {
  exec(command: string, timeoutMs: number): Promise<string>;
  close(): void;
}

export interface SessionTarget {
  host: string;
  port: number;
}

export interface SessionFactory {
  open(target: SessionTarget, credential: Credential, timeoutMs: number): Promise<RemoteSession>;
}

export type CommandResult =
  | { ok: true;  output: string; username: string }
  | { ok: false; reason: SessionErrorKind | 'no-credentials' };

// ─── Implementación sobre ssh2 ───────────────────────────────────────────────

// Incluye algoritmos viejos: muchos switches no negocian nada más moderno
const LEGACY_FRIENDLY_ALGORITHMS = {
  kex: [
    'curve25519-sha256',
    'curve25519-sha256@libssh.org',
    'ecdh-sha2-nistp256',
    'ecdh-sha2-nistp384',
    'ecdh-sha2-nistp521',
    'diffie-hellman-group-exchange-sha256',
    'diffie-hellman-group14-sha256',
    'diffie-hellman-group14-sha1',
    'diffie-hellman-group1-sha1',
  ],
  serverHostKey: [
    'ssh-ed25519',
    'ecdsa-sha2-nistp256',
    'ecdsa-sha2-nistp384',
    'ecdsa-sha2-nistp521',
    'rsa-sha2-512',
    'rsa-sha2-256',
    'ssh-rsa',
  ],
} as const;

class Ssh2Session implements RemoteSession {
  constructor(private readonly client: Client) {}

  exec(command: string, timeoutMs: number): Promise<string> {
    return new Promise((resolve, reject) => {
      let channel: ClientChannel | null = null;
      let output = '';
      let settled = false;

      const finish = (err: SessionError | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) reject(err);
        else resolve(output.trim());
      };

      const timer = setTimeout(() => {
        channel?.close();
        finish(new SessionError('timeout', `Comando "${command}" sin respuesta (>${timeoutMs}ms)`));
      }, timeoutMs);

      this.client.exec(command, (err, stream) => {
        if (err) {
          finish(new SessionError('exec', err.message));
          return;
        }
        channel = stream;
        stream.on('data', (chunk: Buffer) => {
          output += chunk.toString('utf8');
        });
        // stderr se descarta, pero hay que consumirlo para que el canal no se trabe
        stream.stderr.on('data', () => undefined);
        stream.on('close', () => finish(null));
      });
    });
  }

  close(): void {
    this.client.end();
  }
}

export class Ssh2SessionFactory implements SessionFactory {
  open(target: SessionTarget, credential: Credential, timeoutMs: number): Promise<RemoteSession> {
    return new Promise((resolve, reject) => {
      const client = new Client();
      let settled = false;

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        client.end();
        reject(new SessionError('timeout', `Sin respuesta de ${target.host} (>${timeoutMs}ms)`));
      }, timeoutMs);

      client.on('ready', () => {
        clearTimeout(timer);
        if (settled) {
          // Llegó tarde: ya se dio por vencido
          client.end();
          return;
        }
        settled = true;
        resolve(new Ssh2Session(client));
      });

      client.on('error', (err) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        client.end();
        // Los fallos de autenticación vienen con level 'client-authentication'
        const kind: SessionErrorKind = err.level === 'client-authentication' ? 'auth' : 'connect';
        reject(new SessionError(kind, err.message));
      });

      client.connect({
        host:         target.host,
        port:         target.port,
        username:     credential.username,
        password:     credential.password,
        readyTimeout: timeoutMs,
        tryKeyboard:  false,
        algorithms:   {
          kex:           [...LEGACY_FRIENDLY_ALGORITHMS.kex],
          serverHostKey: [...LEGACY_FRIENDLY_ALGORITHMS.serverHostKey],
        },
      });
    });
  }
}

// ─── Ejecución de comandos con cadena de credenciales ────────────────────────

// Margen sobre el timeout propio de la sesión; corta sesiones que no respetan el suyo
const SESSION_GRACE_MS = 250;

function failureKind(err: unknown): SessionErrorKind {
  if (err instanceof SessionError) return err.kind;
  return err instanceof TimeoutError ? 'timeout' : 'connect';
}

export interface SshCommandRunnerOptions {
  credentials: readonly Credential[];
  timeoutMs:   number;
  port:        number;
  factory?:    SessionFactory;
}

export class SshCommandRunner {
  private readonly credentials: readonly Credential[];
  private readonly timeoutMs: number;
  private readonly port: number;
  private readonly factory: SessionFactory;

  constructor(options: SshCommandRunnerOptions) {
    this.credentials = options.credentials;
    this.timeoutMs   = options.timeoutMs;
    this.port        = options.port;
    this.factory     = options.factory ?? new Ssh2SessionFactory();
  }

  /**
   * Abre sesión con la primera credencial que autentique y ejecuta `command`.
   * Un fallo de conexión o de auth pasa a la siguiente credencial; un fallo
   * del comando en sí termina el intento. Nunca lanza.
   */
  async run(address: string, command: string): Promise<CommandResult> {
    if (!this.credentials.length) return { ok: false, reason: 'no-credentials' };

    const target = { host: address, port: this.port };
    const bound  = this.timeoutMs + SESSION_GRACE_MS;
    let lastFailure: SessionErrorKind = 'connect';

    const opened = await firstSuccess(
      this.credentials.map((credential) => ({
        label: credential.username,
        run:   async () => ({
          session:  await this.openBounded(target, credential, bound),
          username: credential.username,
        }),
      })),
      (username, err) => {
        lastFailure = failureKind(err);
        logger.debug('Intento SSH fallido', { address, username, error: errorMessage(err) });
      },
    );

    if (!opened) {
      logger.debug('Credenciales SSH agotadas', { address, command, reason: lastFailure });
      return { ok: false, reason: lastFailure };
    }

    const { session, username } = opened.value;
    try {
      const output = await withTimeout(session.exec(command, this.timeoutMs), bound, `ssh ${address}: ${command}`);
      return { ok: true, output, username };
    } catch (err) {
      logger.debug('Comando SSH fallido', { address, command, error: errorMessage(err) });
      return { ok: false, reason: err instanceof TimeoutError ? 'timeout' : err instanceof SessionError ? err.kind : 'exec' };
    } finally {
      session.close();
    }
  }

  private async openBounded(target: SessionTarget, credential: Credential, bound: number): Promise<RemoteSession> {
    const pending = this.factory.open(target, credential, this.timeoutMs);
    try {
      return await withTimeout(pending, bound, `ssh ${target.host}`);
    } catch (err) {
      // Si la sesión aparece después de haberla abandonado, se cierra
      if (err instanceof TimeoutError) {
        void pending.then(
          (late) => late.close(),
          (lateErr: unknown) => logger.debug('Sesión SSH abandonada falló', { host: target.host, error: errorMessage(lateErr) }),
        );
      }
      throw err;
    }
  }
}
