// Dobles de prueba compartidos por los tests del motor
import { NameLookup } from '../modules/resolver/resolver.service';
import { RemoteSession, SessionErrorKind, SessionError, SessionFactory, SessionTarget } from '../modules/ssh/ssh.client';
import { Credential } from '../types';

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** DNS en memoria: lo que no está en las tablas falla como ENOTFOUND */
export function fakeLookup(forward: Record<string, string>, reverse: Record<string, string[]>) {
  const calls: { forward: string[]; reverse: string[] } = { forward: [], reverse: [] };

  const lookup: NameLookup = {
    async forward(host) {
      calls.forward.push(host);
      const address = forward[host];
      if (!address) throw new Error(`getaddrinfo ENOTFOUND ${host}`);
      return address;
    },
    async reverse(address) {
      calls.reverse.push(address);
      const names = reverse[address];
      if (!names) throw new Error(`getHostByAddr ENOTFOUND ${address}`);
      return names;
    },
  };

  return { lookup, calls };
}

export type OpenBehaviour = 'ok' | 'hang' | SessionErrorKind;

/** Fábrica de sesiones SSH en memoria */
export class FakeSessionFactory implements SessionFactory {
  readonly opened: Array<{ host: string; username: string; password: string }> = [];
  readonly executed: string[] = [];
  closed = 0;

  constructor(
    private readonly behaviour: (credential: Credential, target: SessionTarget) => OpenBehaviour,
    private readonly execute: (command: string, host: string) => Promise<string>,
  ) {}

  open(target: SessionTarget, credential: Credential): Promise<RemoteSession> {
    this.opened.push({ host: target.host, username: credential.username, password: credential.password });

    const outcome = this.behaviour(credential, target);
    if (outcome === 'hang') return new Promise<RemoteSession>(() => undefined);
    if (outcome !== 'ok') return Promise.reject(new SessionError(outcome, `fallo simulado: ${outcome}`));

    return Promise.resolve({
      exec: (command: string) => {
        this.executed.push(command);
        return this.execute(command, target.host);
      },
      close: () => {
        this.closed++;
      },
    });
  }
}
