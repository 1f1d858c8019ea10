import net from 'net';

export type DialOutcome = 'open' | 'refused' | 'unreachable';

export type Dialer = (
  host: string,
  port: number,
  timeoutMs: number,
  signal?: AbortSignal
) => Promise<DialOutcome>;

const UNREACHABLE_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'EAI_FAIL',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'ENETDOWN',
  'ETIMEDOUT',
  'EADDRNOTAVAIL',
]);

export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Name resolution and routing failures mean nobody answered; anything else
 * means the host answered and turned the connection down.
 */
export function classifyDialError(error: unknown): Exclude<DialOutcome, 'open'> {
  const code = errorCode(error);
  return code !== undefined && UNREACHABLE_CODES.has(code) ? 'unreachable' : 'refused';
}

/**
 * Opens and immediately closes a TCP connection. Timeout and abort both
 * count as unreachable.
 */
export const tcpDial: Dialer = (host, port, timeoutMs, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve('unreachable');
      return;
    }

    const socket = net.createConnection({ host, port });
    let settled = false;

    const finish = (outcome: DialOutcome) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve(outcome);
    };
    const onAbort = () => finish('unreachable');
    const timer = setTimeout(() => finish('unreachable'), timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });
    socket.once('connect', () => finish('open'));
    socket.once('error', (error) => finish(classifyDialError(error)));
  });
